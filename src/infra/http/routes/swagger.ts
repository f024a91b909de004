import { Router } from 'express';
import swaggerUi from 'swagger-ui-express';
import { buildSwaggerSpec } from '../swagger.js';

export function createSwaggerRoutes() {
  const router = Router();

  router.use('/docs', swaggerUi.serve);
  router.get(
    '/docs',
    swaggerUi.setup(buildSwaggerSpec(), {
      customCss: '.swagger-ui .topbar { display: none }',
    })
  );

  return router;
}

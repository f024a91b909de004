/**
 * Call shapes for application operations. A use case holds only the
 * dependencies injected at construction and caches nothing between calls;
 * failures from those dependencies propagate unmodified.
 */
export interface UseCase<Result, Params> {
  execute(params: Params): Promise<Result>;
}

export interface VoidUseCase<Params> {
  execute(params: Params): Promise<void>;
}

export interface NoParamsUseCase<Result> {
  execute(): Promise<Result>;
}

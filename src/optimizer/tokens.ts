// Injection tokens for repository interfaces
export const OPTIMIZATION_RUN_REPOSITORY = Symbol('OptimizationRunRepository');

export * from './quantities';
export * from './pricing';
export * from './orchestrator';

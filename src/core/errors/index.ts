export * from './ErrorContext';
export * from './ModuleRuntimeError';
export * from './errors';
export * from './errorFactory';

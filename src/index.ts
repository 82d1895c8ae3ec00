export * from './admin';
export { API, API_ERROR } from './api';
export * from './auth';
export type { SASLProvider } from './broker';
export * from './client';
export * from './config';
export * from './distributors/group-by-rack';
export * from './distributors/interleave';
export * from './distributors/rotation-window';
export * from './reassignment';
export * from './strategies';
export * from './types';
export * from './utils/error';
export * from './utils/logger';
export { setTracer } from './utils/tracer';
export type { Tracer } from './utils/tracer';

export * from './round-robin-across-racks';
export * from './types';

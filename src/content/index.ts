export * from './backend';
export * from './content-store';
export * from './http-backend';
export * from './memory-backend';
export * from './retry';

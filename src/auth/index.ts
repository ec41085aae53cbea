export * from './identity-provider';
export * from './key-ring';
export * from './token-service';

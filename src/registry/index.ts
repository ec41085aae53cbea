export * from './artifact-manager';
export * from './registry-service';

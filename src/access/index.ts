export * from './access-evaluator';

export * from './invalid-argument.exception';

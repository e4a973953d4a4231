export * from './format';
export * from './utils';

// Re-export state module via its barrel to keep imports cohesive
export * as state from './state';

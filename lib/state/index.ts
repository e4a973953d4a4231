export * from './types';
export * from './errors';
export * from './bids';
export * from './multipliers';
export * from './logic';
export * from './match';
export * from './events';
export * from './validation';
export * from './session';
export * from './reducer';
export * from './selectors';
export * from './player-statistics';
export * from './io';

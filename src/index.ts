export * from './card';
export * from './card-database';
export * from './deck';
export * from './player';
export * from './game-rules';
export * from './game-actions';
export * from './game-events';
export * from './game-engine';
export * from './game-state-serializer';
export * from './rules/rule-engine';
export * from './rules/standard-rules';
export * from './effects/effect-types';
export * from './effects/effect-manager';
export * from './effects/card-effects';
export * from './random';
export * from './errors';
export { ENGINE_DEFAULTS } from './config/engine-defaults';
export { default as logger, createMatchLogger } from './logger';

export * from './constants';
export * from './errors';
export * from './debug';
export * from './member';
export * from './family';
export * from './conversion';
export * from './translation';
export { keyLabel, type KeyIdentifier } from './key-labels';

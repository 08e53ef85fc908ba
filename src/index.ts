export * from './core';
export * from './enums';
export * from './remote/connection-mode';

// Tearable cloth: particle-constraint cloth kernel with a three.js line adapter

export * from './simulation';
export * from './render/ClothLines';
export * from './utils/persistedConfig';
export * from './constants';
export type * from './types';

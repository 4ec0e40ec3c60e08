export * from './channels';
export * from './metrics';
export * from './types';

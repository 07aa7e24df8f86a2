export * from './sensor-state';
export * from './readings-file';

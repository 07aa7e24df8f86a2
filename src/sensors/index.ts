export * from './base-sensor';
export * from './temperature-sensor';
export * from './category-sensor';
export * from './absolute-humidity-sensor';
export * from './open-windows-sensor';
export * from './sensor-manager';

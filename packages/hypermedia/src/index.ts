export * from './documentModel';
export * from './errors';
export * from './schemaResolution';
export * from './operationCatalog';
export * from './catalogCache';
export * from './transitions';
export * from './transitionRefs';
export * from './recordProjector';
export * from './documentAssembler';
export * from './htmlRenderer';
export * from './representor';
export * from './plugin';

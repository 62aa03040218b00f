export * from './contracts/block-scan-executor.js';
export * from './contracts/image-codec.js';
export * from './contracts/pixel-scale-service.js';
export * from './entities/downscale-job.js';
export * from './services/block-factor-detector.js';
export * from './services/frame-reducer.js';
export * from './services/output-path.js';
export * from './services/preconditions.js';
export * from './value-objects/detection-result.js';
export * from './value-objects/frame.js';

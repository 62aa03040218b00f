export * from './codecs/binary.js';
export * from './codecs/canvas-codec.js';
export * from './codecs/gif-codec.js';
export * from './codecs/image-format.js';
export * from './codecs/multi-format-image-codec.js';
export * from './codecs/png-codec.js';
export * from './codecs/webp-codec.js';
export * from './nearest-neighbor-downscale.service.js';
export * from './workers/block-scan-pool.js';
export * from './workers/block-scan.protocol.js';

export * from './commands/downscale-image.command.js';
export * from './dto/downscale-image.dto.js';
export * from './handlers/downscale-image.handler.js';

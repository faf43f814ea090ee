export * from './protocol/constants';
export * from './protocol/response';
export * from './session/line-reader';
export * from './session/handshake';
export * from './session/command-queue';
export * from './session/session';
export * from './server/fastagi-server';
export * from './server/telemetry';
export * from './server/metrics';
export * as commands from './commands';
export * from './utils/errors';
export * from './utils/logger';
export { AgiConfig, DEFAULT_AGI_HOST, DEFAULT_AGI_PORT } from './utils/config';
export type { AgiConfigState } from './utils/config';
export { default as agiConfig } from './utils/config';

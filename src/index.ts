// src/index.ts

export { QueryDispatcher } from './query-dispatcher.js';
export { UdpGateway } from './gateway/udp-gateway.js';
export type { DatagramSocket, DatagramSocketFactory } from './gateway/udp-gateway.js';
export { ResponseFramer } from './framers/response-framer.js';
export { classifyReply, detectReplyKind } from './framers/reply-classifier.js';
export { createSerialChannel } from './transport/factory.js';
export type { SerialChannelDescriptor } from './transport/factory.js';
export { NodeSerialChannel } from './transport/node-transports/node-serialport.js';
export { Elm327Emulator } from './emulator/elm327-emulator.js';
export { runSelfTest } from './self-test.js';
export { loadConfig, USAGE } from './config.js';
export { BridgeDiagnostics } from './utils/diagnostics.js';
export { default as Logger, bridgeLogger } from './logger.js';
export * from './errors.js';
export * from './constants/constants.js';
export type * from './types/bridge-types.js';

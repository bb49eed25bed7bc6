export * from './types.js';
export * from './errors.js';
export { FlowController, type WatermarkConfig, type FlowSnapshot } from './flow/flow-control.js';
export { registerCodec, getCodecByName, listCodecs, resolveCodec } from './codec/registry.js';
export type { WireCodec, RequestParser, ResponseEncoder, RequestHead, ParseEvent } from './codec/types.js';
export { createH1Codec, h1Codec, h1LenientCodec } from './codec/h1.js';
export type { ServerConfig, LifespanMode } from './config/types.js';
export { loadConfig, defaultConfig, validateConfig, ConfigLoader } from './config/load.js';
export { HttpConnection, type ServerState, type ConnectionPhase } from './connectors/connection.js';
export { RequestCycle } from './connectors/request-cycle.js';
export { HandlerTask, currentContext, setContextDefaults, type TaskContext } from './connectors/task.js';
export { Server, type ServerOptions, type ServerPhase, type BoundAddress } from './lifecycle/server.js';
export type { SignalSource } from './lifecycle/signals.js';
export { getLogger, configureLogging, addLogSink, type LogEntry, type LogLevel } from './logging/logger.js';
export { importApplication } from './importer.js';

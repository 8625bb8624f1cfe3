// Types
export * from './core/types/DeviceState';

// Errors and logging
export * from './core/errors/DeviceError';
export { Logger, LoggerConfig, LogMeta, defaultLogger } from './core/logging/Logger';

// Configuration
export * from './core/config/FleetConfig';

// Protocol
export * from './devices/protocol/PJLinkCommands';
export * from './devices/protocol/PJLinkCodec';

// Transport
export * from './devices/transport/LineTransport';
export { TcpLineTransport, TcpTransportFactory } from './devices/transport/TcpLineTransport';

// Registry and resolution
export * from './devices/registry/DeviceRegistry';
export * from './devices/registry/GroupResolver';

// Sessions
export * from './devices/session/DeviceResult';
export * from './devices/session/DeviceSession';

// Fleet control
export * from './devices/controller/GroupReport';
export * from './devices/controller/FleetController';

// Macropad
export * from './macropad/MacropadBridge';

// Testing
export * from './testing/MockProjectorServer';

// Default export
export { FleetController as default } from './devices/controller/FleetController';

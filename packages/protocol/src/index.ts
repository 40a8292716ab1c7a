// @corpledger/protocol
// Shared record, snapshot and change-log types, config schemas and codecs

export * from './types/index.js';
export * from './validation/index.js';
export * from './bundle/index.js';

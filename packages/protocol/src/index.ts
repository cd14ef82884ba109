// @custody/protocol
// Privilege scale, entity and grant types, and input schemas shared by every package.

export * from './types/index.js';
export * from './validation/access.js';

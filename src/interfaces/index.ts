/**
 * @module interfaces
 * @description Collaborator contracts and error classes.
 */

export * from "./event-emitter.js";
export * from "./identity-provider.js";
export * from "./cipher-suite.js";
export * from "./channel.js";
export * from "./transport.js";

/**
 * @module backends
 * @description Concrete crypto backends.
 */

export * from "./crypto-utils.js";
export * from "./noble-suite.js";
export * from "./seed-identity.js";

/**
 * @module codec
 * @description Address and envelope codecs.
 */

export * from "./address.js";
export * from "./envelope.js";

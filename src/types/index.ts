/**
 * @module types
 * @description Re-exports every protocol type.
 */

export type * from "./branded.js";
export type * from "./link.js";
export type * from "./message.js";
export type * from "./channel.js";
export type * from "./events.js";

/**
 * @module transports
 * @description Transport implementations.
 */

export { InMemoryTransport } from "./memory.js";

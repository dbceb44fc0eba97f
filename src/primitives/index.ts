/**
 * @module primitives
 * @description Building blocks of a channel user: event emitter, stores,
 * cursors and the keyload and envelope machinery.
 */

export { ChannelEmitter } from "./base-emitter.js";
export { BranchStore, type KnownMessage } from "./branch-store.js";
export { PskStore, createPsk, pskIdFromKey } from "./psk-store.js";
export { SubscriberRegistry } from "./subscriber-registry.js";
export {
  SequencingState,
  type LinkReservation,
  type PublisherSnapshot,
  type SequencingSnapshot,
  type SequencingStateOptions,
} from "./sequencing-state.js";
export {
  sealEnvelope,
  verifyEnvelope,
  openEnvelope,
  tryOpen,
  type SealOptions,
  type Signer,
} from "./envelope-sealer.js";
export {
  KeyloadManager,
  recipientsOf,
  pskIdsOf,
  type BuildKeyloadOptions,
  type BuiltKeyload,
  type KeyloadOutcome,
  type KeyloadPsk,
  type KeyloadRecipient,
} from "./keyload-manager.js";

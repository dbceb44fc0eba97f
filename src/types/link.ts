/**
 * @module types/link
 * @description Addresses into the transport's key space.
 */

import type { InstanceId, MessageId } from "./branded.js";

/**
 * A unique pointer to one message: the channel instance it belongs to and
 * the message id derived for it. Links are values; compare them with
 * `linkEquals`, never by reference.
 */
export interface Link {
  readonly instanceId: InstanceId;
  readonly messageId: MessageId;
}

/**
 * How publishers chain their messages.
 *
 * - SINGLE: one linear history shared by every publisher. Each message
 *   points at the channel head its sender last saw.
 * - MULTI: every publisher keeps its own counter and messages attach to
 *   the root of the branch they are sent in.
 */
export type BranchingMode = "SINGLE" | "MULTI";

/**
 * packages/core/src/runtime/actionChannel.ts — Output channel for user actions.
 *
 * Why: Widgets report completed user actions (a menu selection, a toggle
 * flip) as application-defined payloads. The host application drains the
 * channel between frames. The channel must accept while any widget is alive,
 * so sending after close is a fatal misconfiguration: it throws and is never
 * buffered or retried.
 */

import { VellumError } from "../errors.js";

export interface ActionSender<A> {
  send(action: A): void;
}

export interface ActionReceiver<A> {
  /** Queued actions in send order; the queue is emptied. */
  drain(): A[];
  pending(): number;
  close(): void;
  isClosed(): boolean;
}

export type ActionChannel<A> = Readonly<{
  sender: ActionSender<A>;
  receiver: ActionReceiver<A>;
}>;

export function createActionChannel<A>(): ActionChannel<A> {
  let queue: A[] = [];
  let closed = false;

  const sender: ActionSender<A> = Object.freeze({
    send: (action: A) => {
      if (closed) {
        throw new VellumError(
          "VELLUM_ACTION_CHANNEL_CLOSED",
          "ActionSender.send: receiver was closed while widgets are still alive",
        );
      }
      queue.push(action);
    },
  });

  const receiver: ActionReceiver<A> = Object.freeze({
    drain: () => {
      const out = queue;
      queue = [];
      return out;
    },
    pending: () => queue.length,
    close: () => {
      closed = true;
      queue = [];
    },
    isClosed: () => closed,
  });

  return Object.freeze({ sender, receiver });
}

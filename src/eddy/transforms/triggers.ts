/*
 * Licensed to the Apache Software Foundation (ASF) under one
 * or more contributor license agreements.  See the NOTICE file
 * distributed with this work for additional information
 * regarding copyright ownership.  The ASF licenses this file
 * to you under the Apache License, Version 2.0 (the
 * "License"); you may not use this file except in compliance
 * with the License.  You may obtain a copy of the License at
 *
 *     http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */

/**
 * Triggers decide when the data collected for a window is emitted as a pane.
 *
 * A trigger is a plain, serializable description built from the functions
 * below, e.g.
 *
 * ```js
 * afterWatermark({ early: afterProcessingTime(seconds(30)), late: afterCount(1) })
 * repeatedly(afterCount(100))
 * orFinally(repeatedly(afterProcessingTime(minutes(1))), afterWatermark())
 * ```
 *
 * Triggers see element timestamps, element counts, the input watermark and
 * processing time, never the element values. Evaluation lives in
 * worker/trigger_state_machine.ts.
 *
 * @packageDocumentation
 */

import Long from "long";
import { Reader, Writer } from "protobufjs";

import { ConfigurationError } from "../internal/errors";
import { Duration, Instant, TimeDomain, Window } from "../values";

export type Trigger =
  | { kind: "default" }
  | { kind: "never" }
  | { kind: "afterWatermark"; early?: Trigger; late?: Trigger }
  | { kind: "afterCount"; count: number }
  | { kind: "afterProcessingTime"; delay: Duration }
  | { kind: "repeatedly"; subtrigger: Trigger }
  | { kind: "afterAll"; subtriggers: Trigger[] }
  | { kind: "afterFirst"; subtriggers: Trigger[] }
  | { kind: "afterEach"; subtriggers: Trigger[] }
  | { kind: "orFinally"; main: Trigger; until: Trigger }
  | {
      kind: "custom";
      urn: string;
      payload: Uint8Array;
      subtriggers: Trigger[];
    };


/**
 * Fires once the watermark passes the end of the window, then once for every
 * late element. Never finishes.
 */
export function defaultTrigger(): Trigger {
  return { kind: "default" };
}

/** Never fires; the window is only emitted when it is garbage collected. */
export function never(): Trigger {
  return { kind: "never" };
}

/**
 * Fires when the watermark passes the end of the window. Early firings
 * repeat until then and late firings repeat afterwards; without late firings
 * the trigger finishes at the on-time pane.
 */
export function afterWatermark(
  options: { early?: Trigger; late?: Trigger } = {},
): Trigger {
  return { kind: "afterWatermark", early: options.early, late: options.late };
}

export function afterCount(count: number): Trigger {
  return { kind: "afterCount", count };
}

/** Fires `delay` milliseconds of processing time after the first element. */
export function afterProcessingTime(delay: number | Long): Trigger {
  return { kind: "afterProcessingTime", delay: Long.fromValue(delay) };
}

export function repeatedly(subtrigger: Trigger): Trigger {
  return { kind: "repeatedly", subtrigger };
}

export function afterAll(...subtriggers: Trigger[]): Trigger {
  return { kind: "afterAll", subtriggers };
}

export function afterFirst(...subtriggers: Trigger[]): Trigger {
  return { kind: "afterFirst", subtriggers };
}

export function afterEach(...subtriggers: Trigger[]): Trigger {
  return { kind: "afterEach", subtriggers };
}

export function orFinally(main: Trigger, until: Trigger): Trigger {
  return { kind: "orFinally", main, until };
}

export function customTrigger(
  urn: string,
  payload: Uint8Array = new Uint8Array(),
  ...subtriggers: Trigger[]
): Trigger {
  if (!triggerFns.has(urn)) {
    throw new ConfigurationError("No trigger registered for " + urn);
  }
  return { kind: "custom", urn, payload, subtriggers };
}

/** The state a trigger keeps for one window. */
export interface TriggerState {
  finished: boolean;
  count: number;
  timestamp?: Instant;
  children: TriggerState[];
}

export interface SubtriggerHandle {
  isFinished(): boolean;
  shouldFire(): boolean;
  onFire(): void;
  reset(): void;
}

export interface TriggerFnContext {
  readonly payload: Uint8Array;
  readonly window: Window;
  readonly inputWatermark: Instant;
  readonly processingTime: Instant;
  readonly state: TriggerState;
  readonly subtriggers: SubtriggerHandle[];
  setTimer(domain: TimeDomain, timestamp: Instant): void;
}

/**
 * A user-defined trigger, registered under a urn and referenced with
 * `customTrigger`. Elements and merges are forwarded to unfinished
 * subtriggers before the hooks below run; on merge the runtime has already
 * merged the state (counts summed, earliest timestamp kept).
 */
export interface TriggerFn {
  isOnce(payload: Uint8Array): boolean;
  canMerge(payload: Uint8Array): boolean;
  onElement(context: TriggerFnContext, timestamp: Instant): void;
  onMerge(context: TriggerFnContext): void;
  shouldFire(context: TriggerFnContext): boolean;
  /** Called when the trigger fires; set `context.state.finished` to finish. */
  onFire(context: TriggerFnContext): void;
}

const triggerFns = new Map<string, TriggerFn>();

export function registerTriggerFn(urn: string, triggerFn: TriggerFn) {
  triggerFns.set(urn, triggerFn);
}

export function getTriggerFn(urn: string): TriggerFn {
  const triggerFn = triggerFns.get(urn);
  if (triggerFn === undefined) {
    throw new ConfigurationError("No trigger registered for " + urn);
  }
  return triggerFn;
}

/** The direct children of a trigger, in evaluation order. */
export function subtriggersOf(trigger: Trigger): Trigger[] {
  switch (trigger.kind) {
    case "default":
    case "never":
    case "afterCount":
    case "afterProcessingTime":
      return [];
    case "afterWatermark":
      return [trigger.early ?? never(), trigger.late ?? never()];
    case "repeatedly":
      return [trigger.subtrigger];
    case "afterAll":
    case "afterFirst":
    case "afterEach":
    case "custom":
      return trigger.subtriggers;
    case "orFinally":
      return [trigger.main, trigger.until];
  }
}

/** Whether the trigger is guaranteed to finish after firing once. */
export function isOnce(trigger: Trigger): boolean {
  switch (trigger.kind) {
    case "never":
    case "afterCount":
    case "afterProcessingTime":
      return true;
    case "afterWatermark":
      return trigger.late === undefined;
    case "afterAll":
    case "afterFirst":
    case "afterEach":
      return trigger.subtriggers.every(isOnce);
    case "orFinally":
      return isOnce(trigger.main);
    case "custom":
      return getTriggerFn(trigger.urn).isOnce(trigger.payload);
    case "default":
    case "repeatedly":
      return false;
  }
}

function canMerge(trigger: Trigger): boolean {
  if (
    trigger.kind === "custom" &&
    !getTriggerFn(trigger.urn).canMerge(trigger.payload)
  ) {
    return false;
  }
  return subtriggersOf(trigger).every(canMerge);
}

/**
 * Rejects triggers that can never run as intended.
 *
 * @throws ConfigurationError
 */
export function validateTrigger(trigger: Trigger, merging: boolean) {
  if (merging && !canMerge(trigger)) {
    throw new ConfigurationError(
      `Trigger ${triggerToString(trigger)} cannot be used with a merging window function`,
    );
  }
  validateTree(trigger);
}

function validateTree(trigger: Trigger) {
  switch (trigger.kind) {
    case "afterCount":
      if (!Number.isInteger(trigger.count) || trigger.count < 1) {
        throw new ConfigurationError(
          `afterCount requires a positive integer count, got ${trigger.count}`,
        );
      }
      break;
    case "afterProcessingTime":
      if (trigger.delay.isNegative()) {
        throw new ConfigurationError(
          `afterProcessingTime delay must not be negative, got ${trigger.delay.toString()}`,
        );
      }
      break;
    case "afterWatermark":
      requireOnce("early firings", trigger.early);
      requireOnce("late firings", trigger.late);
      break;
    case "afterAll":
    case "afterFirst":
      requireChildren(trigger.kind, trigger.subtriggers);
      trigger.subtriggers.forEach((t) => requireOnce(trigger.kind, t));
      break;
    case "afterEach":
      requireChildren(trigger.kind, trigger.subtriggers);
      break;
    case "orFinally":
      requireOnce("orFinally until", trigger.until);
      break;
    case "custom":
      getTriggerFn(trigger.urn);
      break;
  }
  subtriggersOf(trigger).forEach(validateTree);
}

function requireChildren(kind: string, subtriggers: Trigger[]) {
  if (subtriggers.length === 0) {
    throw new ConfigurationError(`${kind} requires at least one subtrigger`);
  }
}

function requireOnce(what: string, trigger: Trigger | undefined) {
  if (trigger !== undefined && !isOnce(trigger)) {
    throw new ConfigurationError(
      `${what} must be a trigger that fires once, got ${triggerToString(trigger)}`,
    );
  }
}

export function triggerToString(trigger: Trigger): string {
  switch (trigger.kind) {
    case "afterCount":
      return `afterCount(${trigger.count})`;
    case "afterProcessingTime":
      return `afterProcessingTime(${trigger.delay.toString()})`;
    case "afterWatermark": {
      const parts: string[] = [];
      if (trigger.early) parts.push("early: " + triggerToString(trigger.early));
      if (trigger.late) parts.push("late: " + triggerToString(trigger.late));
      return `afterWatermark(${parts.join(", ")})`;
    }
    case "custom":
      return `${trigger.urn}(${trigger.subtriggers.map(triggerToString).join(", ")})`;
    default:
      return `${trigger.kind}(${subtriggersOf(trigger).map(triggerToString).join(", ")})`;
  }
}

export function encodeTrigger(trigger: Trigger, writer: Writer) {
  writer.string(trigger.kind);
  switch (trigger.kind) {
    case "default":
    case "never":
      break;
    case "afterWatermark":
      encodeOptionalTrigger(trigger.early, writer);
      encodeOptionalTrigger(trigger.late, writer);
      break;
    case "afterCount":
      writer.int32(trigger.count);
      break;
    case "afterProcessingTime":
      writer.int64(trigger.delay);
      break;
    case "repeatedly":
      encodeTrigger(trigger.subtrigger, writer);
      break;
    case "afterAll":
    case "afterFirst":
    case "afterEach":
      encodeTriggers(trigger.subtriggers, writer);
      break;
    case "orFinally":
      encodeTrigger(trigger.main, writer);
      encodeTrigger(trigger.until, writer);
      break;
    case "custom":
      writer.string(trigger.urn);
      writer.bytes(trigger.payload);
      encodeTriggers(trigger.subtriggers, writer);
      break;
  }
}

function encodeOptionalTrigger(trigger: Trigger | undefined, writer: Writer) {
  writer.bool(trigger !== undefined);
  if (trigger !== undefined) {
    encodeTrigger(trigger, writer);
  }
}

function encodeTriggers(triggers: Trigger[], writer: Writer) {
  writer.int32(triggers.length);
  triggers.forEach((t) => encodeTrigger(t, writer));
}

export function decodeTrigger(reader: Reader): Trigger {
  const kind = reader.string();
  switch (kind) {
    case "default":
      return defaultTrigger();
    case "never":
      return never();
    case "afterWatermark": {
      const early = decodeOptionalTrigger(reader);
      const late = decodeOptionalTrigger(reader);
      return afterWatermark({ early, late });
    }
    case "afterCount":
      return afterCount(reader.int32());
    case "afterProcessingTime":
      return afterProcessingTime(Long.fromValue(reader.int64()));
    case "repeatedly":
      return repeatedly(decodeTrigger(reader));
    case "afterAll":
      return afterAll(...decodeTriggers(reader));
    case "afterFirst":
      return afterFirst(...decodeTriggers(reader));
    case "afterEach":
      return afterEach(...decodeTriggers(reader));
    case "orFinally": {
      const main = decodeTrigger(reader);
      return orFinally(main, decodeTrigger(reader));
    }
    case "custom": {
      const urn = reader.string();
      const payload = reader.bytes();
      return customTrigger(urn, payload, ...decodeTriggers(reader));
    }
    default:
      throw new ConfigurationError("Unknown trigger kind " + kind);
  }
}

function decodeOptionalTrigger(reader: Reader): Trigger | undefined {
  return reader.bool() ? decodeTrigger(reader) : undefined;
}

function decodeTriggers(reader: Reader): Trigger[] {
  const count = reader.int32();
  const result: Trigger[] = [];
  for (let i = 0; i < count; i++) {
    result.push(decodeTrigger(reader));
  }
  return result;
}

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

import Long from "long";
import { Reader, Writer } from "protobufjs";

import { WindowFn, windowFnFromSpec } from "./window";
import {
  Trigger,
  decodeTrigger,
  defaultTrigger,
  encodeTrigger,
  validateTrigger,
} from "./triggers";
import "./windowings";
import { ConfigurationError } from "../internal/errors";
import { WINDOWING_STRATEGY_VERSION } from "../internal/urns";
import {
  Duration,
  GLOBAL_WINDOW_MAX_TIMESTAMP,
  Instant,
  Window,
  minInstant,
} from "../values";

export enum AccumulationMode {
  /** Each pane holds only the data that arrived since the previous pane. */
  DISCARDING = "DISCARDING",
  /** Each pane holds all the data seen so far for the window. */
  ACCUMULATING = "ACCUMULATING",
}

export enum OutputTime {
  END_OF_WINDOW = "END_OF_WINDOW",
  EARLIEST_IN_PANE = "EARLIEST_IN_PANE",
  LATEST_IN_PANE = "LATEST_IN_PANE",
}

export enum ClosingBehavior {
  /** Emit the final pane only if it has new data. */
  FIRE_IF_NON_EMPTY = "FIRE_IF_NON_EMPTY",
  /** Always emit a final pane, even an empty one, once a window has fired. */
  FIRE_ALWAYS = "FIRE_ALWAYS",
}

/**
 * How the finished bits of trigger sub-state combine when windows merge:
 * finished if any merged window had finished it, or only if all had.
 */
export enum MergedTriggerFinishing {
  ANY = "ANY",
  ALL = "ALL",
}

export interface WindowingStrategy<W extends Window = Window> {
  readonly windowFn: WindowFn<W>;
  readonly trigger: Trigger;
  readonly accumulationMode: AccumulationMode;
  readonly allowedLateness: Duration;
  readonly outputTime: OutputTime;
  readonly closingBehavior: ClosingBehavior;
  readonly mergedTriggerFinishing: MergedTriggerFinishing;
}

export interface WindowingStrategyOptions {
  trigger?: Trigger;
  accumulationMode?: AccumulationMode;
  allowedLateness?: number | Long;
  outputTime?: OutputTime;
  closingBehavior?: ClosingBehavior;
  mergedTriggerFinishing?: MergedTriggerFinishing;
}

/**
 * Bundles a window function with the trigger and policies that govern its
 * panes, rejecting combinations that cannot run.
 *
 * @throws ConfigurationError
 */
export function windowingStrategy<W extends Window>(
  windowFn: WindowFn<W>,
  options: WindowingStrategyOptions = {},
): WindowingStrategy<W> {
  const allowedLateness = Long.fromValue(options.allowedLateness ?? 0);
  if (allowedLateness.isNegative()) {
    throw new ConfigurationError(
      `Allowed lateness must not be negative, got ${allowedLateness.toString()}`,
    );
  }
  const trigger = options.trigger ?? defaultTrigger();
  validateTrigger(trigger, windowFn.isMerging());
  return Object.freeze({
    windowFn,
    trigger,
    accumulationMode: options.accumulationMode ?? AccumulationMode.DISCARDING,
    allowedLateness,
    outputTime: options.outputTime ?? OutputTime.END_OF_WINDOW,
    closingBehavior:
      options.closingBehavior ?? ClosingBehavior.FIRE_IF_NON_EMPTY,
    mergedTriggerFinishing:
      options.mergedTriggerFinishing ?? MergedTriggerFinishing.ANY,
  });
}

/**
 * The time after which a window's state is dropped and late data for it is
 * discarded.
 */
export function garbageCollectionTime(
  window: Window,
  allowedLateness: Duration,
): Instant {
  return minInstant(
    window.maxTimestamp().add(allowedLateness),
    GLOBAL_WINDOW_MAX_TIMESTAMP,
  );
}

/** Serializes a strategy into an opaque blob for shipping to workers. */
export function encodeWindowingStrategy(
  strategy: WindowingStrategy,
): Uint8Array {
  const writer = new Writer();
  writer.int32(WINDOWING_STRATEGY_VERSION);
  const spec = strategy.windowFn.toSpec();
  writer.string(spec.urn);
  writer.bytes(spec.payload);
  encodeTrigger(strategy.trigger, writer);
  writer.string(strategy.accumulationMode);
  writer.int64(strategy.allowedLateness);
  writer.string(strategy.outputTime);
  writer.string(strategy.closingBehavior);
  writer.string(strategy.mergedTriggerFinishing);
  return writer.finish();
}

export function decodeWindowingStrategy(blob: Uint8Array): WindowingStrategy {
  const reader = new Reader(blob);
  const version = reader.int32();
  if (version !== WINDOWING_STRATEGY_VERSION) {
    throw new ConfigurationError(
      `Unsupported windowing strategy version ${version}`,
    );
  }
  const urn = reader.string();
  const windowFn = windowFnFromSpec({ urn, payload: reader.bytes() });
  const trigger = decodeTrigger(reader);
  return windowingStrategy(windowFn, {
    trigger,
    accumulationMode: enumValue(AccumulationMode, reader.string()),
    allowedLateness: Long.fromValue(reader.int64()),
    outputTime: enumValue(OutputTime, reader.string()),
    closingBehavior: enumValue(ClosingBehavior, reader.string()),
    mergedTriggerFinishing: enumValue(MergedTriggerFinishing, reader.string()),
  });
}

function enumValue<E extends string>(
  values: Record<string, E>,
  value: string,
): E {
  const result = Object.values(values).find((v) => v === value);
  if (result === undefined) {
    throw new ConfigurationError("Unknown windowing option " + value);
  }
  return result;
}

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

import {
  FunctionSpec,
  MergeResult,
  WindowFn,
  registerWindowFn,
} from "./window";
import {
  GlobalWindowCoder,
  IntervalWindowCoder,
} from "../coders/standard_coders";
import { ConfigurationError } from "../internal/errors";
import * as urns from "../internal/urns";
import {
  Duration,
  GlobalWindow,
  Instant,
  IntervalWindow,
  Window,
} from "../values";

export function globalWindows(): WindowFn<GlobalWindow> {
  return {
    windowFnName: "globalWindows()",
    assignWindows: (timestamp: Instant) => [new GlobalWindow()],
    windowCoder: () => GlobalWindowCoder.INSTANCE,
    isMerging: () => false,
    mergeWindows: (windows: GlobalWindow[]) => [],
    getSideInputWindow: (mainWindow: Window) => new GlobalWindow(),
    toSpec: () => ({
      urn: urns.GLOBAL_WINDOWS_URN,
      payload: new Uint8Array(),
    }),
  };
}

/**
 * Windows of a fixed size, aligned to multiples of the size shifted by
 * `offset`. Sizes and offsets are in milliseconds.
 */
export function fixedWindows(
  size: number | Long,
  offset: number | Long = 0,
): WindowFn<IntervalWindow> {
  const sizeMillis = positiveMillis("fixedWindows size", size);
  const offsetMillis = offsetMillisWithin(sizeMillis, offset);

  function assign(t: Instant): IntervalWindow {
    const start = t.sub(floorMod(t.sub(offsetMillis), sizeMillis));
    return new IntervalWindow(start, start.add(sizeMillis));
  }

  return {
    windowFnName: offsetMillis.isZero()
      ? `fixedWindows(${sizeMillis})`
      : `fixedWindows(${sizeMillis}, ${offsetMillis})`,
    assignWindows: (t: Instant) => [assign(t)],
    windowCoder: () => IntervalWindowCoder.INSTANCE,
    isMerging: () => false,
    mergeWindows: (windows: IntervalWindow[]) => [],
    getSideInputWindow: (mainWindow: Window) =>
      assign(mainWindow.maxTimestamp()),
    toSpec: () => ({
      urn: urns.FIXED_WINDOWS_URN,
      payload: encodeDurations([sizeMillis, offsetMillis]),
    }),
  };
}

/**
 * Overlapping windows of length `size`, one starting every `period`
 * milliseconds.
 */
export function slidingWindows(
  size: number | Long,
  period: number | Long,
  offset: number | Long = 0,
): WindowFn<IntervalWindow> {
  const sizeMillis = positiveMillis("slidingWindows size", size);
  const periodMillis = positiveMillis("slidingWindows period", period);
  const offsetMillis = offsetMillisWithin(periodMillis, offset);

  function lastStartFor(t: Instant): Instant {
    return t.sub(floorMod(t.sub(offsetMillis), periodMillis));
  }

  return {
    windowFnName: offsetMillis.isZero()
      ? `slidingWindows(${sizeMillis}, ${periodMillis})`
      : `slidingWindows(${sizeMillis}, ${periodMillis}, ${offsetMillis})`,
    assignWindows: (t: Instant) => {
      let start = lastStartFor(t);
      const windows: IntervalWindow[] = [];
      while (t.compare(start.add(sizeMillis)) < 0) {
        windows.push(new IntervalWindow(start, start.add(sizeMillis)));
        start = start.sub(periodMillis);
      }
      return windows;
    },
    windowCoder: () => IntervalWindowCoder.INSTANCE,
    isMerging: () => false,
    mergeWindows: (windows: IntervalWindow[]) => [],
    // The latest window that ends after the main window does.
    getSideInputWindow: (mainWindow: Window) => {
      const start = lastStartFor(mainWindow.maxTimestamp());
      return new IntervalWindow(start, start.add(sizeMillis));
    },
    toSpec: () => ({
      urn: urns.SLIDING_WINDOWS_URN,
      payload: encodeDurations([sizeMillis, periodMillis, offsetMillis]),
    }),
  };
}

/**
 * Each element starts a window of length `gap`; windows that overlap merge,
 * so a session ends after `gap` milliseconds without data.
 */
export function sessions(gap: number | Long): WindowFn<IntervalWindow> {
  const gapMillis = positiveMillis("sessions gap", gap);

  return {
    windowFnName: `sessions(${gapMillis})`,
    assignWindows: (t: Instant) => [new IntervalWindow(t, t.add(gapMillis))],
    windowCoder: () => IntervalWindowCoder.INSTANCE,
    isMerging: () => true,
    mergeWindows: mergeOverlappingIntervalWindows,
    getSideInputWindow: (mainWindow: Window) => {
      throw new ConfigurationError(
        "Session windows cannot be used to window side inputs.",
      );
    },
    toSpec: () => ({
      urn: urns.SESSION_WINDOWS_URN,
      payload: encodeDurations([gapMillis]),
    }),
  };
}

/**
 * Merges every group of transitively overlapping windows into their span.
 * Windows that overlap nothing are left out of the result.
 */
export function mergeOverlappingIntervalWindows(
  windows: IntervalWindow[],
): MergeResult<IntervalWindow>[] {
  const sorted = [...windows].sort((a, b) => a.compareTo(b));
  const results: MergeResult<IntervalWindow>[] = [];
  let group: IntervalWindow[] = [];
  let union: IntervalWindow | undefined = undefined;
  for (const window of sorted) {
    if (union !== undefined && window.start.lt(union.end)) {
      group.push(window);
      union = union.span(window);
    } else {
      if (union !== undefined && group.length > 1) {
        results.push({ toBeMerged: group, mergeResult: union });
      }
      group = [window];
      union = window;
    }
  }
  if (union !== undefined && group.length > 1) {
    results.push({ toBeMerged: group, mergeResult: union });
  }
  return results;
}

// Long.mod truncates towards zero; windows need the floored remainder.
function floorMod(value: Long, divisor: Long): Long {
  const remainder = value.mod(divisor);
  return remainder.isNegative() ? remainder.add(divisor) : remainder;
}

function positiveMillis(what: string, value: number | Long): Duration {
  const millis = Long.fromValue(value);
  if (millis.lte(0)) {
    throw new ConfigurationError(
      `${what} must be positive, got ${millis.toString()}`,
    );
  }
  return millis;
}

function offsetMillisWithin(bound: Duration, offset: number | Long): Duration {
  const millis = Long.fromValue(offset);
  if (millis.isNegative() || millis.gte(bound)) {
    throw new ConfigurationError(
      `Window offset must be in [0, ${bound.toString()}), got ${millis.toString()}`,
    );
  }
  return millis;
}

function encodeDurations(durations: Duration[]): Uint8Array {
  const writer = new Writer();
  for (const d of durations) {
    writer.int64(d);
  }
  return writer.finish();
}

function decodeDurations(payload: Uint8Array, count: number): Duration[] {
  const reader = new Reader(payload);
  const result: Duration[] = [];
  for (let i = 0; i < count; i++) {
    result.push(Long.fromValue(reader.int64()));
  }
  return result;
}

registerWindowFn(urns.GLOBAL_WINDOWS_URN, () => globalWindows());
registerWindowFn(urns.FIXED_WINDOWS_URN, (payload) => {
  const [size, offset] = decodeDurations(payload, 2);
  return fixedWindows(size, offset);
});
registerWindowFn(urns.SLIDING_WINDOWS_URN, (payload) => {
  const [size, period, offset] = decodeDurations(payload, 3);
  return slidingWindows(size, period, offset);
});
registerWindowFn(urns.SESSION_WINDOWS_URN, (payload) => {
  const [gap] = decodeDurations(payload, 1);
  return sessions(gap);
});

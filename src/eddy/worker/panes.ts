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

import { Reader, Writer } from "protobufjs";

import { Coder, Context } from "../coders/coders";
import { InstantCoder } from "../coders/required_coders";
import { NullableCoder, VarIntCoder } from "../coders/standard_coders";
import { OutputTime } from "../transforms/windowing_strategy";
import {
  Instant,
  PaneInfo,
  Timing,
  Window,
  maxInstant,
  minInstant,
} from "../values";

/**
 * Bookkeeping for the pane a window is currently building, plus the counts
 * of panes it already emitted.
 */
export interface PaneStats {
  /** Elements added since the last firing. */
  elementCount: number;
  onTimeCount: number;
  lateCount: number;
  earliestOnTime?: Instant;
  latestOnTime?: Instant;
  /** Panes emitted so far. */
  paneIndex: number;
  /** Panes emitted once the watermark had passed the end of the window. */
  nonEarlyPanes: number;
}

export function emptyPaneStats(): PaneStats {
  return {
    elementCount: 0,
    onTimeCount: 0,
    lateCount: 0,
    earliestOnTime: undefined,
    latestOnTime: undefined,
    paneIndex: 0,
    nonEarlyPanes: 0,
  };
}

export function recordElement(
  stats: PaneStats,
  timestamp: Instant,
  isLate: boolean,
) {
  stats.elementCount += 1;
  if (isLate) {
    stats.lateCount += 1;
    return;
  }
  stats.onTimeCount += 1;
  stats.earliestOnTime =
    stats.earliestOnTime === undefined
      ? timestamp
      : minInstant(stats.earliestOnTime, timestamp);
  stats.latestOnTime =
    stats.latestOnTime === undefined
      ? timestamp
      : maxInstant(stats.latestOnTime, timestamp);
}

export function mergePaneStats(all: PaneStats[]): PaneStats {
  const result = emptyPaneStats();
  for (const stats of all) {
    result.elementCount += stats.elementCount;
    result.onTimeCount += stats.onTimeCount;
    result.lateCount += stats.lateCount;
    result.earliestOnTime = optionalMin(
      result.earliestOnTime,
      stats.earliestOnTime,
    );
    result.latestOnTime = optionalMax(result.latestOnTime, stats.latestOnTime);
    result.paneIndex = Math.max(result.paneIndex, stats.paneIndex);
    result.nonEarlyPanes = Math.max(result.nonEarlyPanes, stats.nonEarlyPanes);
  }
  return result;
}

function optionalMin(a: Instant | undefined, b: Instant | undefined) {
  return a === undefined ? b : b === undefined ? a : minInstant(a, b);
}

function optionalMax(a: Instant | undefined, b: Instant | undefined) {
  return a === undefined ? b : b === undefined ? a : maxInstant(a, b);
}

/**
 * The metadata of the next pane of `window`, given the input watermark at
 * the time it fires.
 */
export function nextPaneInfo(
  stats: PaneStats,
  window: Window,
  inputWatermark: Instant,
  isLast: boolean,
): PaneInfo {
  const early = inputWatermark.lte(window.maxTimestamp());
  return {
    timing: early
      ? Timing.EARLY
      : stats.nonEarlyPanes === 0
        ? Timing.ON_TIME
        : Timing.LATE,
    index: stats.paneIndex,
    onTimeIndex: early ? -1 : stats.nonEarlyPanes,
    isFirst: stats.paneIndex === 0,
    isLast,
  };
}

/** Starts a new pane once `pane` was emitted. */
export function paneEmitted(stats: PaneStats, pane: PaneInfo) {
  stats.paneIndex += 1;
  if (pane.timing !== Timing.EARLY) {
    stats.nonEarlyPanes += 1;
  }
  clearPendingElements(stats);
}

export function clearPendingElements(stats: PaneStats) {
  stats.elementCount = 0;
  stats.onTimeCount = 0;
  stats.lateCount = 0;
  stats.earliestOnTime = undefined;
  stats.latestOnTime = undefined;
}

export function outputTimestamp(
  stats: PaneStats,
  window: Window,
  outputTime: OutputTime,
): Instant {
  switch (outputTime) {
    case OutputTime.EARLIEST_IN_PANE:
      return stats.earliestOnTime ?? window.maxTimestamp();
    case OutputTime.LATEST_IN_PANE:
      return stats.latestOnTime ?? window.maxTimestamp();
    case OutputTime.END_OF_WINDOW:
      return window.maxTimestamp();
  }
}

/**
 * The watermark hold for the pending elements of a window, or undefined if
 * nothing is pending. Late elements only hold the watermark back to the
 * window's garbage collection time.
 */
export function watermarkHold(
  stats: PaneStats,
  window: Window,
  outputTime: OutputTime,
  gcTime: Instant,
): Instant | undefined {
  if (stats.elementCount === 0) {
    return undefined;
  } else if (stats.onTimeCount === 0) {
    return gcTime;
  }
  return outputTimestamp(stats, window, outputTime);
}

const countCoder: Coder<number> = VarIntCoder.INSTANCE;
const optionalInstantCoder = new NullableCoder(InstantCoder.INSTANCE);

export class PaneStatsCoder implements Coder<PaneStats> {
  static INSTANCE = new PaneStatsCoder();

  encode(stats: PaneStats, writer: Writer, context: Context) {
    countCoder.encode(stats.elementCount, writer, Context.needsDelimiters);
    countCoder.encode(stats.onTimeCount, writer, Context.needsDelimiters);
    countCoder.encode(stats.lateCount, writer, Context.needsDelimiters);
    optionalInstantCoder.encode(
      stats.earliestOnTime,
      writer,
      Context.needsDelimiters,
    );
    optionalInstantCoder.encode(
      stats.latestOnTime,
      writer,
      Context.needsDelimiters,
    );
    countCoder.encode(stats.paneIndex, writer, Context.needsDelimiters);
    countCoder.encode(stats.nonEarlyPanes, writer, Context.needsDelimiters);
  }

  decode(reader: Reader, context: Context): PaneStats {
    return {
      elementCount: countCoder.decode(reader, Context.needsDelimiters),
      onTimeCount: countCoder.decode(reader, Context.needsDelimiters),
      lateCount: countCoder.decode(reader, Context.needsDelimiters),
      earliestOnTime: optionalInstantCoder.decode(
        reader,
        Context.needsDelimiters,
      ),
      latestOnTime: optionalInstantCoder.decode(
        reader,
        Context.needsDelimiters,
      ),
      paneIndex: countCoder.decode(reader, Context.needsDelimiters),
      nonEarlyPanes: countCoder.decode(reader, Context.needsDelimiters),
    };
  }
}

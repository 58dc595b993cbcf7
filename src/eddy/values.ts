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

export type KV<K, V> = {
  key: K;
  value: V;
};

/** Milliseconds since the epoch. */
export type Instant = Long;

/** A length of time in milliseconds. */
export type Duration = Long;

export const MIN_TIMESTAMP: Instant = Long.fromString("-9223372036854775");
export const MAX_TIMESTAMP: Instant = Long.fromString("9223372036854775");

// One day before MAX_TIMESTAMP, so that timers at the end of the global
// window can still fire before the end of all input.
export const GLOBAL_WINDOW_MAX_TIMESTAMP: Instant = MAX_TIMESTAMP.sub(
  24 * 60 * 60 * 1000,
);

export function millis(value: number | Long): Duration {
  return Long.fromValue(value);
}

export function seconds(value: number | Long): Duration {
  return Long.fromValue(value).mul(1000);
}

export function minutes(value: number | Long): Duration {
  return seconds(value).mul(60);
}

export function hours(value: number | Long): Duration {
  return minutes(value).mul(60);
}

export function minInstant(a: Instant, b: Instant): Instant {
  return a.lte(b) ? a : b;
}

export function maxInstant(a: Instant, b: Instant): Instant {
  return a.gte(b) ? a : b;
}

export interface Window {
  maxTimestamp(): Instant;
  equals(other: Window): boolean;
  toString(): string;
}

export class GlobalWindow implements Window {
  maxTimestamp(): Instant {
    return GLOBAL_WINDOW_MAX_TIMESTAMP;
  }

  equals(other: Window): boolean {
    return other instanceof GlobalWindow;
  }

  toString(): string {
    return "GlobalWindow";
  }
}

/**
 * A half-open interval `[start, end)` of event time.
 */
export class IntervalWindow implements Window {
  constructor(
    public start: Instant,
    public end: Instant,
  ) {}

  maxTimestamp() {
    return this.end.sub(1);
  }

  equals(other: Window): boolean {
    return (
      other instanceof IntervalWindow &&
      this.start.eq(other.start) &&
      this.end.eq(other.end)
    );
  }

  contains(other: IntervalWindow): boolean {
    return this.start.lte(other.start) && this.end.gte(other.end);
  }

  intersects(other: IntervalWindow): boolean {
    return this.start.lt(other.end) && other.start.lt(this.end);
  }

  /** The smallest window covering both this and `other`. */
  span(other: IntervalWindow): IntervalWindow {
    return new IntervalWindow(
      minInstant(this.start, other.start),
      maxInstant(this.end, other.end),
    );
  }

  compareTo(other: IntervalWindow): number {
    const byStart = this.start.compare(other.start);
    return byStart !== 0 ? byStart : this.end.compare(other.end);
  }

  toString(): string {
    return `[${this.start.toString()}, ${this.end.toString()})`;
  }
}

export interface WindowedValue<T> {
  value: T;
  windows: Array<Window>;
  pane: PaneInfo;
  timestamp: Instant;
}

export interface PaneInfo {
  timing: Timing;
  index: number;
  onTimeIndex: number;
  isFirst: boolean;
  isLast: boolean;
}

export enum Timing {
  EARLY = "EARLY",
  ON_TIME = "ON_TIME",
  LATE = "LATE",
  UNKNOWN = "UNKNOWN",
}

export enum TimeDomain {
  EVENT_TIME = "EVENT_TIME",
  PROCESSING_TIME = "PROCESSING_TIME",
}

export const NO_FIRING: PaneInfo = {
  timing: Timing.UNKNOWN,
  index: 0,
  onTimeIndex: 0,
  isFirst: true,
  isLast: true,
};

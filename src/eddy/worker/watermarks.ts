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

import { stageLogPrefix } from "./logging";
import { Instant, MIN_TIMESTAMP, minInstant } from "../values";

/**
 * Tracks the input watermark, processing time, and the holds that keep the
 * output watermark from passing data not yet emitted.
 */
export class WatermarkState {
  private inputWatermark: Instant = MIN_TIMESTAMP;
  private processingTime: Instant;
  private holds: Map<string, Instant> = new Map();

  constructor(processingTime: Instant = MIN_TIMESTAMP) {
    this.processingTime = processingTime;
  }

  getInputWatermark(): Instant {
    return this.inputWatermark;
  }

  getProcessingTime(): Instant {
    return this.processingTime;
  }

  /**
   * Moves the input watermark forward. A watermark behind the current one is
   * ignored, returning false.
   */
  advanceInputWatermark(watermark: Instant): boolean {
    if (watermark.lt(this.inputWatermark)) {
      console.warn(
        `${stageLogPrefix()}Ignoring input watermark ${watermark.toString()} behind current watermark ${this.inputWatermark.toString()}`,
      );
      return false;
    }
    this.inputWatermark = watermark;
    return true;
  }

  advanceProcessingTime(time: Instant): boolean {
    if (time.lt(this.processingTime)) {
      console.warn(
        `${stageLogPrefix()}Ignoring processing time ${time.toString()} behind current processing time ${this.processingTime.toString()}`,
      );
      return false;
    }
    this.processingTime = time;
    return true;
  }

  getHold(holdId: string): Instant | undefined {
    return this.holds.get(holdId);
  }

  setHold(holdId: string, timestamp: Instant | undefined) {
    if (timestamp === undefined) {
      this.holds.delete(holdId);
    } else {
      this.holds.set(holdId, timestamp);
    }
  }

  /** The earliest hold of any key and window, if there is one. */
  getWatermarkHold(): Instant | undefined {
    let result: Instant | undefined = undefined;
    for (const hold of this.holds.values()) {
      result = result === undefined ? hold : minInstant(result, hold);
    }
    return result;
  }

  getOutputWatermark(): Instant {
    const hold = this.getWatermarkHold();
    return hold === undefined
      ? this.inputWatermark
      : minInstant(this.inputWatermark, hold);
  }
}

/** Hold changes made by one work item, applied when it commits. */
export class WorkItemHolds {
  private changes: Map<string, Instant | undefined> = new Map();

  constructor(private watermarks: WatermarkState) {}

  getHold(holdId: string): Instant | undefined {
    return this.changes.has(holdId)
      ? this.changes.get(holdId)
      : this.watermarks.getHold(holdId);
  }

  setHold(holdId: string, timestamp: Instant | undefined) {
    this.changes.set(holdId, timestamp);
  }

  commit() {
    for (const [holdId, timestamp] of this.changes) {
      this.watermarks.setHold(holdId, timestamp);
    }
    this.changes.clear();
  }

  abandon() {
    this.changes.clear();
  }
}

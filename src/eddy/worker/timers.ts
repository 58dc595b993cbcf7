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

import { Instant, TimeDomain } from "../values";

export interface TimerData {
  /** The encoded key the timer belongs to. */
  key: string;
  /** The encoded window the timer belongs to. */
  windowId: string;
  domain: TimeDomain;
  timestamp: Instant;
}

function timerId(timer: TimerData): string {
  return [
    timer.key,
    timer.windowId,
    timer.domain,
    timer.timestamp.toString(),
  ].join("|");
}

/**
 * Holds the timers of every key. Event-time timers are due once the input
 * watermark passes their timestamp, processing-time timers once processing
 * time reaches it.
 */
export class TimerService {
  private timers: Map<string, TimerData> = new Map();

  setTimer(timer: TimerData) {
    this.timers.set(timerId(timer), timer);
  }

  deleteTimer(timer: TimerData) {
    this.timers.delete(timerId(timer));
  }

  deleteWindowTimers(key: string, windowId: string) {
    for (const [id, timer] of this.timers) {
      if (timer.key === key && timer.windowId === windowId) {
        this.timers.delete(id);
      }
    }
  }

  /** Removes and returns the due timers, earliest first. */
  extractDue(inputWatermark: Instant, processingTime: Instant): TimerData[] {
    const due: TimerData[] = [];
    for (const [id, timer] of this.timers) {
      const isDue =
        timer.domain === TimeDomain.EVENT_TIME
          ? inputWatermark.gt(timer.timestamp)
          : processingTime.gte(timer.timestamp);
      if (isDue) {
        due.push(timer);
        this.timers.delete(id);
      }
    }
    return due.sort((a, b) => a.timestamp.compare(b.timestamp));
  }

  /** Returns timers previously extracted but not processed. */
  restore(timers: TimerData[]) {
    timers.forEach((timer) => this.setTimer(timer));
  }

  pendingTimers(key?: string): TimerData[] {
    return [...this.timers.values()].filter(
      (timer) => key === undefined || timer.key === key,
    );
  }
}

type TimerChange =
  | { type: "set"; timer: TimerData }
  | { type: "delete"; timer: TimerData }
  | { type: "deleteWindow"; windowId: string };

/**
 * Timer changes made by one work item, applied in order when it commits.
 */
export class WorkItemTimers {
  private changes: TimerChange[] = [];

  constructor(
    private service: TimerService,
    public readonly key: string,
  ) {}

  setTimer(windowId: string, domain: TimeDomain, timestamp: Instant) {
    this.changes.push({
      type: "set",
      timer: { key: this.key, windowId, domain, timestamp },
    });
  }

  deleteTimer(windowId: string, domain: TimeDomain, timestamp: Instant) {
    this.changes.push({
      type: "delete",
      timer: { key: this.key, windowId, domain, timestamp },
    });
  }

  deleteWindowTimers(windowId: string) {
    this.changes.push({ type: "deleteWindow", windowId });
  }

  commit() {
    for (const change of this.changes) {
      switch (change.type) {
        case "set":
          this.service.setTimer(change.timer);
          break;
        case "delete":
          this.service.deleteTimer(change.timer);
          break;
        case "deleteWindow":
          this.service.deleteWindowTimers(this.key, change.windowId);
          break;
      }
    }
    this.changes = [];
  }

  abandon() {
    this.changes = [];
  }
}

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

import * as uuid from "uuid";

import { Coder, decodeFromBase64, encodeToBytes } from "../coders/coders";
import {
  GlobalWindowCoder,
  KVCoder,
  WindowedValueCoder,
} from "../coders/required_coders";
import { ConfigurationError, WorkItemError } from "../internal/errors";
import { WORK_ITEM_RETRIES } from "../internal/urns";
import {
  GlobalWindow,
  Instant,
  KV,
  NO_FIRING,
  Window,
  WindowedValue,
} from "../values";
import { GroupAlsoByWindowReducer } from "../worker/group_also_by_window";
import { stageLogPrefix } from "../worker/logging";
import { MetricsContainer } from "../worker/metrics";
import {
  BundleReader,
  GroupAlsoByWindowOperator,
  KeyedExecutor,
  WorkItem,
  WorkItemEvent,
} from "../worker/operators";
import { InMemorySideInputs, SideInputFetcher } from "../worker/side_inputs";
import { InMemoryStateStore } from "../worker/state";
import { TimerData, TimerService } from "../worker/timers";
import { WatermarkState } from "../worker/watermarks";

export interface DirectRunnerOptions<K, V> {
  keyCoder: Coder<K>;
  valueCoder: Coder<V>;
  /** Attempts per work item before its failure is surfaced. Defaults to 3. */
  maxWorkItemAttempts?: number;
  /** Elements per bundle. Defaults to 100. */
  bundleSize?: number;
  /**
   * If set, every bundle is split after its first element, giving up this
   * fraction of the remainder to a new bundle.
   */
  splitFraction?: number;
  /** Read before each bundle to move processing time forward. */
  clock?: () => Instant;
  sideInputs?: SideInputFetcher;
  transformId?: string;
}

export interface TimestampedElement<K, V> {
  key: K;
  value: V;
  timestamp: Instant;
}

export type RunnerEvent<K, V> =
  | ({ type: "element" } & TimestampedElement<K, V>)
  | { type: "watermark"; watermark: Instant }
  | { type: "processingTime"; time: Instant };

export interface DirectRunResult<K, O> {
  panes: WindowedValue<KV<K, O>>[];
  metrics: MetricsContainer;
  watermarkHold: Instant | undefined;
  outputWatermark: Instant;
}

export function directRunner<K, V, O, W extends Window>(
  reducer: GroupAlsoByWindowReducer<K, V, O, W>,
  options: DirectRunnerOptions<K, V>,
): DirectRunner<K, V, O, W> {
  return new DirectRunner(reducer, options);
}

/**
 * Runs a reducer in process over a script of elements, watermark and
 * processing time advances. Each bundle of elements is grouped into one work
 * item per key; due timers are delivered the same way after every advance.
 */
export class DirectRunner<K, V, O, W extends Window = Window> {
  readonly stateStore = new InMemoryStateStore();
  readonly timers = new TimerService();
  readonly watermarks = new WatermarkState();
  readonly metrics = new MetricsContainer();
  readonly sideInputs: SideInputFetcher;

  private operator: GroupAlsoByWindowOperator<K, V, O, W>;
  private executor = new KeyedExecutor();
  private elementCoder: WindowedValueCoder<KV<K, V>, GlobalWindow>;
  private panes: WindowedValue<KV<K, O>>[] = [];
  private maxWorkItemAttempts: number;
  private bundleSize: number;

  constructor(
    reducer: GroupAlsoByWindowReducer<K, V, O, W>,
    private options: DirectRunnerOptions<K, V>,
  ) {
    this.maxWorkItemAttempts = options.maxWorkItemAttempts ?? 3;
    this.bundleSize = options.bundleSize ?? 100;
    if (this.maxWorkItemAttempts < 1 || this.bundleSize < 1) {
      throw new ConfigurationError(
        "maxWorkItemAttempts and bundleSize must be at least 1",
      );
    }
    this.sideInputs = options.sideInputs ?? new InMemorySideInputs();
    this.operator = new GroupAlsoByWindowOperator(
      options.transformId ?? "GroupAlsoByWindow",
      reducer,
      options.keyCoder,
      {
        stateStore: this.stateStore,
        timers: this.timers,
        watermarks: this.watermarks,
        sideInputs: this.sideInputs,
      },
    );
    this.elementCoder = new WindowedValueCoder(
      new KVCoder(options.keyCoder, options.valueCoder),
      GlobalWindowCoder.INSTANCE,
    );
  }

  async run(events: RunnerEvent<K, V>[]): Promise<DirectRunResult<K, O>> {
    let elements: TimestampedElement<K, V>[] = [];
    for (const event of events) {
      if (event.type === "element") {
        elements.push(event);
        continue;
      }
      await this.processElements(elements);
      elements = [];
      if (event.type === "watermark") {
        await this.advanceInputWatermark(event.watermark);
      } else {
        await this.advanceProcessingTime(event.time);
      }
    }
    await this.processElements(elements);
    return {
      panes: this.takeOutputs(),
      metrics: this.metrics,
      watermarkHold: this.watermarks.getWatermarkHold(),
      outputWatermark: this.watermarks.getOutputWatermark(),
    };
  }

  async processElements(elements: TimestampedElement<K, V>[]) {
    const pending: Uint8Array[][] = [];
    for (let i = 0; i < elements.length; i += this.bundleSize) {
      pending.push(
        elements.slice(i, i + this.bundleSize).map((e) =>
          encodeToBytes(
            {
              value: { key: e.key, value: e.value },
              windows: [new GlobalWindow()],
              pane: NO_FIRING,
              timestamp: e.timestamp,
            },
            this.elementCoder,
          ),
        ),
      );
    }
    let bundle = pending.shift();
    while (bundle !== undefined) {
      await this.processBundle(bundle, pending);
      bundle = pending.shift();
    }
  }

  async advanceInputWatermark(watermark: Instant) {
    if (this.watermarks.advanceInputWatermark(watermark)) {
      await this.fireTimers();
    }
  }

  async advanceProcessingTime(time: Instant) {
    if (this.watermarks.advanceProcessingTime(time)) {
      await this.fireTimers();
    }
  }

  /** Returns and forgets the panes emitted so far. */
  takeOutputs(): WindowedValue<KV<K, O>>[] {
    const panes = this.panes;
    this.panes = [];
    return panes;
  }

  private async processBundle(
    elements: Uint8Array[],
    pending: Uint8Array[][],
  ) {
    await this.tick();
    const bundleId = uuid.v4();
    const reader = new BundleReader(bundleId, elements, this.elementCoder);
    const byKey = new Map<string, WorkItem<K, V>>();
    let element = reader.next();
    if (element !== undefined && this.options.splitFraction !== undefined) {
      const split = reader.split(this.options.splitFraction);
      if (split !== undefined) {
        console.debug(
          `${stageLogPrefix()}Split bundle ${bundleId} after element ${split.lastPrimaryIndex}`,
        );
        pending.unshift(split.residual);
      }
    }
    while (element !== undefined) {
      this.workItemFor(byKey, bundleId, element.value.key).events.push({
        type: "element",
        value: element.value.value,
        timestamp: element.timestamp,
      });
      element = reader.next();
    }
    await this.runWorkItems([...byKey.values()]);
  }

  /** Delivers due timers until none are left. */
  private async fireTimers() {
    let due = this.extractDueTimers();
    while (due.length > 0) {
      const bundleId = uuid.v4();
      const byKey = new Map<string, WorkItem<K, V>>();
      for (const timer of due) {
        this.workItemFor(
          byKey,
          bundleId,
          decodeFromBase64(timer.key, this.options.keyCoder),
        ).events.push({ type: "timer", timer });
      }
      await this.runWorkItems([...byKey.values()]);
      due = this.extractDueTimers();
    }
  }

  private extractDueTimers(): TimerData[] {
    return this.timers.extractDue(
      this.watermarks.getInputWatermark(),
      this.watermarks.getProcessingTime(),
    );
  }

  private workItemFor(
    byKey: Map<string, WorkItem<K, V>>,
    bundleId: string,
    key: K,
  ): WorkItem<K, V> {
    const keyId = this.operator.encodeKey(key);
    let item = byKey.get(keyId);
    if (item === undefined) {
      item = { id: `${bundleId}-${byKey.size}`, key, events: [] };
      byKey.set(keyId, item);
    }
    return item;
  }

  /** Moves processing time to the clock's reading and fires what is due. */
  private async tick() {
    if (
      this.options.clock !== undefined &&
      this.watermarks.advanceProcessingTime(this.options.clock())
    ) {
      await this.fireTimers();
    }
  }

  /**
   * Runs work items of different keys concurrently. Every item runs to
   * completion before the first failure, if any, is thrown.
   */
  private async runWorkItems(items: WorkItem<K, V>[]) {
    const results = await Promise.allSettled(
      items.map((item) => this.runWorkItem(item)),
    );
    for (const result of results) {
      if (result.status === "rejected") {
        throw result.reason;
      }
    }
  }

  private async runWorkItem(item: WorkItem<K, V>): Promise<void> {
    const keyId = this.operator.encodeKey(item.key);
    for (let attempt = 1; ; attempt++) {
      try {
        const result = await this.executor.submit(keyId, () =>
          this.operator.process(item),
        );
        this.metrics.merge(result.metrics);
        this.panes.push(...result.outputs);
        return;
      } catch (error) {
        if (error instanceof ConfigurationError) {
          throw error;
        }
        if (attempt >= this.maxWorkItemAttempts) {
          this.timers.restore(timersOf(item.events));
          throw new WorkItemError(
            `Work item ${item.id} failed after ${attempt} attempts: ${error}`,
            keyId,
            attempt,
            { cause: error },
          );
        }
        this.metrics.counter(WORK_ITEM_RETRIES).update(1);
        console.warn(
          `${stageLogPrefix()}Retrying work item ${item.id} after attempt ${attempt} failed: ${error}`,
        );
      }
    }
  }
}

function timersOf<V>(events: WorkItemEvent<V>[]): TimerData[] {
  const timers: TimerData[] = [];
  for (const event of events) {
    if (event.type === "timer") {
      timers.push(event.timer);
    }
  }
  return timers;
}

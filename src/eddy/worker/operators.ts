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

import { Coder, decodeFromBytes, encodeToBase64 } from "../coders/coders";
import { Instant, KV, Window, WindowedValue } from "../values";
import {
  GroupAlsoByWindowReducer,
  ReducerContext,
} from "./group_also_by_window";
import { stageLogPrefix, withLoggingStageInfo } from "./logging";
import { MetricsContainer } from "./metrics";
import { SideInputFetcher, SideInputReader } from "./side_inputs";
import { StateStore, WorkItemState } from "./state";
import { TimerData, TimerService, WorkItemTimers } from "./timers";
import { WatermarkState, WorkItemHolds } from "./watermarks";

export type WorkItemEvent<V> =
  | { type: "element"; value: V; timestamp: Instant }
  | { type: "timer"; timer: TimerData };

/** The events of one key, processed in order and committed together. */
export interface WorkItem<K, V> {
  id: string;
  key: K;
  events: WorkItemEvent<V>[];
}

export interface WorkItemResult<K, O> {
  outputs: WindowedValue<KV<K, O>>[];
  metrics: MetricsContainer;
}

/** The shared services a work item reads, and writes to on commit. */
export interface OperatorServices {
  stateStore: StateStore;
  timers: TimerService;
  watermarks: WatermarkState;
  sideInputs: SideInputFetcher;
}

/**
 * Runs the work items of a GroupAlsoByWindowReducer.
 *
 * Each work item sees its own writes; its state, timer and hold changes, its
 * metrics and its outputs reach the shared services only once every event
 * was processed. A failing work item leaves no trace.
 */
export class GroupAlsoByWindowOperator<K, V, O, W extends Window = Window> {
  constructor(
    public readonly transformId: string,
    private reducer: GroupAlsoByWindowReducer<K, V, O, W>,
    private keyCoder: Coder<K>,
    private services: OperatorServices,
  ) {}

  encodeKey(key: K): string {
    return encodeToBase64(key, this.keyCoder);
  }

  async process(workItem: WorkItem<K, V>): Promise<WorkItemResult<K, O>> {
    const keyId = this.encodeKey(workItem.key);
    const state = new WorkItemState(this.services.stateStore, keyId);
    const timers = new WorkItemTimers(this.services.timers, keyId);
    const holds = new WorkItemHolds(this.services.watermarks);
    const outputs: WindowedValue<KV<K, O>>[] = [];
    const metrics = new MetricsContainer();
    const context: ReducerContext<K, O> = {
      key: workItem.key,
      state,
      timers,
      holds,
      metrics,
      sideInputs: new SideInputReader(this.services.sideInputs),
      inputWatermark: this.services.watermarks.getInputWatermark(),
      processingTime: this.services.watermarks.getProcessingTime(),
      output: (value) => outputs.push(value),
    };

    try {
      await withLoggingStageInfo(
        { workItemId: workItem.id, transformId: this.transformId, key: keyId },
        async () => {
          for (const event of workItem.events) {
            if (event.type === "element") {
              await this.reducer.processElement(
                context,
                event.value,
                event.timestamp,
              );
            } else {
              await this.reducer.processTimer(context, event.timer);
            }
          }
        },
      );
    } catch (error) {
      state.abandon();
      timers.abandon();
      holds.abandon();
      throw error;
    }

    await state.commit();
    timers.commit();
    holds.commit();
    return { outputs, metrics };
  }
}

/**
 * Serializes the work of each key: work submitted for a key starts only once
 * all earlier work for that key has settled. Different keys run
 * concurrently.
 */
export class KeyedExecutor {
  private tails: Map<string, Promise<void>> = new Map();

  submit<T>(key: string, work: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(work);
    // The tail only orders later work; failures reach the caller via result.
    const tail: Promise<void> = result.then(
      () => this.release(key, tail),
      () => this.release(key, tail),
    );
    this.tails.set(key, tail);
    return result;
  }

  private release(key: string, tail: Promise<void>) {
    if (this.tails.get(key) === tail) {
      this.tails.delete(key);
    }
  }
}

export interface SplitResult {
  lastPrimaryIndex: number;
  firstResidualIndex: number;
  /** The encoded elements given up by this reader. */
  residual: Uint8Array[];
}

/**
 * Reads a bundle of encoded elements, allowing the unread tail of the bundle
 * to be split off while reading.
 */
export class BundleReader<T> {
  private lastProcessedIndex = -1;
  private lastToProcessIndex: number;

  constructor(
    public readonly bundleId: string,
    private elements: Uint8Array[],
    private coder: Coder<WindowedValue<T>>,
  ) {
    this.lastToProcessIndex = elements.length - 1;
  }

  next(): WindowedValue<T> | undefined {
    if (this.lastProcessedIndex >= this.lastToProcessIndex) {
      return undefined;
    }
    this.lastProcessedIndex += 1;
    return decodeFromBytes(this.elements[this.lastProcessedIndex], this.coder);
  }

  /**
   * Gives up `fractionOfRemainder` of the unread elements, returning them,
   * or undefined if no meaningful split point exists.
   */
  split(fractionOfRemainder: number): SplitResult | undefined {
    if (
      !Number.isFinite(fractionOfRemainder) ||
      fractionOfRemainder < 0 ||
      fractionOfRemainder >= 1
    ) {
      console.warn(
        `${stageLogPrefix()}Ignoring split of bundle ${this.bundleId} at invalid fraction ${fractionOfRemainder}`,
      );
      return undefined;
    }
    const end = this.lastToProcessIndex;
    if (this.lastProcessedIndex >= end) {
      return undefined;
    }
    // Split fractionOfRemainder of the way between our current position and
    // the end.
    const targetLastToProcessIndex = Math.floor(
      this.lastProcessedIndex +
        (end - this.lastProcessedIndex) * fractionOfRemainder,
    );
    if (
      this.lastProcessedIndex <= targetLastToProcessIndex &&
      targetLastToProcessIndex < this.lastToProcessIndex
    ) {
      const residual = this.elements.slice(
        targetLastToProcessIndex + 1,
        end + 1,
      );
      this.lastToProcessIndex = targetLastToProcessIndex;
      return {
        lastPrimaryIndex: this.lastToProcessIndex,
        firstResidualIndex: this.lastToProcessIndex + 1,
        residual,
      };
    }
    return undefined;
  }
}

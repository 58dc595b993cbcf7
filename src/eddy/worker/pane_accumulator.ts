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

import { Coder, decodeFromBytes, encodeToBytes } from "../coders/coders";
import { GeneralObjectCoder } from "../coders/js_coders";
import { CombineFn } from "../transforms/group_and_combine";
import { WorkItemState } from "./state";

/**
 * Collects the data of each window between firings. Windows are addressed by
 * their encoded form.
 */
export interface PaneAccumulator<V, O> {
  add(state: WorkItemState, windowId: string, value: V): Promise<void>;
  /** Moves the data of every source window into the target window. */
  merge(
    state: WorkItemState,
    sourceIds: string[],
    targetId: string,
  ): Promise<void>;
  extract(state: WorkItemState, windowId: string): Promise<O>;
  clear(state: WorkItemState, windowId: string): void;
}

/** Keeps every value, emitting them as an array in arrival order. */
export class BufferingAccumulator<V> implements PaneAccumulator<V, V[]> {
  constructor(private valueCoder: Coder<V>) {}

  async add(state: WorkItemState, windowId: string, value: V) {
    state.listAppend(bufferTag(windowId), encodeToBytes(value, this.valueCoder));
  }

  async merge(state: WorkItemState, sourceIds: string[], targetId: string) {
    const merged: Uint8Array[] = [];
    for (const sourceId of sourceIds) {
      merged.push(...(await state.listRead(bufferTag(sourceId))));
      state.listDelete(bufferTag(sourceId));
    }
    state.listDelete(bufferTag(targetId));
    merged.forEach((data) => state.listAppend(bufferTag(targetId), data));
  }

  async extract(state: WorkItemState, windowId: string): Promise<V[]> {
    return (await state.listRead(bufferTag(windowId))).map((data) =>
      decodeFromBytes(data, this.valueCoder),
    );
  }

  clear(state: WorkItemState, windowId: string) {
    state.listDelete(bufferTag(windowId));
  }
}

/**
 * Folds values into a single accumulator per window with a CombineFn.
 * Accumulators are stored with the CombineFn's accumulator coder, or as
 * general javascript objects when it has none.
 */
export class CombiningAccumulator<V, A, O> implements PaneAccumulator<V, O> {
  private accumulatorCoder: Coder<A>;

  constructor(
    private combineFn: CombineFn<V, A, O>,
    valueCoder: Coder<V>,
  ) {
    this.accumulatorCoder =
      combineFn.accumulatorCoder?.(valueCoder) ?? new GeneralObjectCoder<A>();
  }

  async add(state: WorkItemState, windowId: string, value: V) {
    const accumulator =
      (await this.read(state, windowId)) ?? this.combineFn.createAccumulator();
    this.write(state, windowId, this.combineFn.addInput(accumulator, value));
  }

  async merge(state: WorkItemState, sourceIds: string[], targetId: string) {
    const accumulators: A[] = [];
    for (const sourceId of sourceIds) {
      const accumulator = await this.read(state, sourceId);
      if (accumulator !== undefined) {
        accumulators.push(accumulator);
      }
      state.delete(accumulatorTag(sourceId));
    }
    if (accumulators.length > 0) {
      this.write(
        state,
        targetId,
        this.combineFn.mergeAccumulators(accumulators),
      );
    }
  }

  async extract(state: WorkItemState, windowId: string): Promise<O> {
    return this.combineFn.extractOutput(
      (await this.read(state, windowId)) ?? this.combineFn.createAccumulator(),
    );
  }

  clear(state: WorkItemState, windowId: string) {
    state.delete(accumulatorTag(windowId));
  }

  private read(state: WorkItemState, windowId: string) {
    return state.readValue(accumulatorTag(windowId), this.accumulatorCoder);
  }

  private write(state: WorkItemState, windowId: string, accumulator: A) {
    state.writeValue(accumulatorTag(windowId), this.accumulatorCoder, accumulator);
  }
}

function bufferTag(windowId: string) {
  return windowId + "/buffer";
}

function accumulatorTag(windowId: string) {
  return windowId + "/accum";
}

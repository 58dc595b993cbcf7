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

import { decodeFromBase64, encodeToBase64 } from "../coders/coders";
import { IterableCoder } from "../coders/required_coders";
import { MergeResult, WindowFn } from "../transforms/window";
import { Window } from "../values";
import { WorkItemState } from "./state";

const ACTIVE_WINDOWS_TAG = "windows:active";
const FINISHED_WINDOWS_TAG = "windows:finished";

/**
 * The windows of one key that hold state. Active windows may still receive
 * data and fire; finished windows are kept only until they are garbage
 * collected, so that late data for them can be recognized and dropped.
 *
 * Windows are identified by their base64 encoding under the window
 * function's coder.
 */
export class ActiveWindowSet<W extends Window> {
  private active: Map<string, W> = new Map();
  private finished: Map<string, W> = new Map();
  private changed = false;
  private windowsCoder: IterableCoder<W>;

  private constructor(
    private state: WorkItemState,
    private windowFn: WindowFn<W>,
  ) {
    this.windowsCoder = new IterableCoder(windowFn.windowCoder());
  }

  static async load<W extends Window>(
    state: WorkItemState,
    windowFn: WindowFn<W>,
  ): Promise<ActiveWindowSet<W>> {
    const result = new ActiveWindowSet(state, windowFn);
    for (const w of await result.read(ACTIVE_WINDOWS_TAG)) {
      result.active.set(result.windowId(w), w);
    }
    for (const w of await result.read(FINISHED_WINDOWS_TAG)) {
      result.finished.set(result.windowId(w), w);
    }
    return result;
  }

  windowId(window: W): string {
    return encodeToBase64(window, this.windowFn.windowCoder());
  }

  decodeWindowId(windowId: string): W {
    return decodeFromBase64(windowId, this.windowFn.windowCoder());
  }

  activeWindows(): W[] {
    return [...this.active.values()];
  }

  isActive(window: W): boolean {
    return this.active.has(this.windowId(window));
  }

  isFinished(window: W): boolean {
    return this.finished.has(this.windowId(window));
  }

  add(window: W) {
    const id = this.windowId(window);
    if (!this.active.has(id)) {
      this.active.set(id, window);
      this.changed = true;
    }
  }

  /** Moves a window from the active set to the finished set. */
  finish(window: W) {
    const id = this.windowId(window);
    this.active.delete(id);
    this.finished.set(id, window);
    this.changed = true;
  }

  /** Forgets a window entirely, as at garbage collection. */
  remove(window: W) {
    const id = this.windowId(window);
    const wasActive = this.active.delete(id);
    const wasFinished = this.finished.delete(id);
    this.changed = this.changed || wasActive || wasFinished;
  }

  /**
   * Adds `protoWindow` to the active set, merging it with the active windows
   * as the window function directs. Returns the merges applied and the
   * window the new data belongs to once they are applied.
   */
  mergeWith(protoWindow: W): { merges: MergeResult<W>[]; window: W } {
    if (!this.windowFn.isMerging()) {
      this.add(protoWindow);
      return { merges: [], window: protoWindow };
    }
    const candidates = this.isActive(protoWindow)
      ? this.activeWindows()
      : [...this.activeWindows(), protoWindow];
    const merges = this.windowFn.mergeWindows(candidates);
    let window = protoWindow;
    for (const merge of merges) {
      for (const source of merge.toBeMerged) {
        this.active.delete(this.windowId(source));
        if (source.equals(protoWindow)) {
          window = merge.mergeResult;
        }
      }
      this.active.set(this.windowId(merge.mergeResult), merge.mergeResult);
    }
    this.add(window);
    this.changed = true;
    return { merges, window };
  }

  /** Writes the sets back to the work item's state if they changed. */
  persist() {
    if (!this.changed) {
      return;
    }
    this.write(ACTIVE_WINDOWS_TAG, this.active);
    this.write(FINISHED_WINDOWS_TAG, this.finished);
    this.changed = false;
  }

  private async read(tag: string): Promise<W[]> {
    const windows = await this.state.readValue(tag, this.windowsCoder);
    return Array.from(windows ?? []);
  }

  private write(tag: string, windows: Map<string, W>) {
    if (windows.size === 0) {
      this.state.delete(tag);
    } else {
      this.state.writeValue(tag, this.windowsCoder, windows.values());
    }
  }
}

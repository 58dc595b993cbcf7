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

import {
  Coder,
  decodeFromBytes,
  encodeToBase64,
  encodeToBytes,
} from "../coders/coders";
import { WindowFn } from "../transforms/window";
import { Window } from "../values";

/** How a side input is published and read: a tag and its windowing. */
export interface SideInputView<T, W extends Window = Window> {
  tag: string;
  windowFn: WindowFn<W>;
  coder: Coder<T>;
}

export interface SideInputSnapshot {
  version: number;
  data: Uint8Array;
}

/** Where side input values live, one snapshot per tag and window. */
export interface SideInputFetcher {
  fetch(tag: string, windowId: string): SideInputSnapshot | undefined;
}

/**
 * Keeps the latest snapshot of every side input window in memory. Each
 * publication replaces the previous value and bumps the version.
 */
export class InMemorySideInputs implements SideInputFetcher {
  private snapshots: Map<string, SideInputSnapshot> = new Map();

  publish<T, W extends Window>(
    view: SideInputView<T, W>,
    window: W,
    value: T,
  ): number {
    const id = snapshotId(
      view.tag,
      encodeToBase64(window, view.windowFn.windowCoder()),
    );
    const version = (this.snapshots.get(id)?.version ?? 0) + 1;
    this.snapshots.set(id, { version, data: encodeToBytes(value, view.coder) });
    return version;
  }

  fetch(tag: string, windowId: string) {
    return this.snapshots.get(snapshotId(tag, windowId));
  }
}

function snapshotId(tag: string, windowId: string) {
  return tag + " " + windowId;
}

/**
 * Reads side inputs on behalf of one attempt at a work item. The first read
 * of each side input window pins its snapshot, so that every element of the
 * attempt sees the same version; a retry reads afresh.
 */
export class SideInputReader {
  private cache: Map<string, SideInputSnapshot | undefined> = new Map();

  constructor(private fetcher: SideInputFetcher) {}

  /**
   * The side input value for an element in `mainWindow`, or undefined if
   * nothing was published for the corresponding side input window.
   */
  get<T, W extends Window>(
    view: SideInputView<T, W>,
    mainWindow: Window,
  ): T | undefined {
    const snapshot = this.snapshot(view, mainWindow);
    return snapshot === undefined
      ? undefined
      : decodeFromBytes(snapshot.data, view.coder);
  }

  /** The version read for a side input window, if anything was published. */
  version<T, W extends Window>(
    view: SideInputView<T, W>,
    mainWindow: Window,
  ): number | undefined {
    return this.snapshot(view, mainWindow)?.version;
  }

  private snapshot<T, W extends Window>(
    view: SideInputView<T, W>,
    mainWindow: Window,
  ): SideInputSnapshot | undefined {
    const windowId = encodeToBase64(
      view.windowFn.getSideInputWindow(mainWindow),
      view.windowFn.windowCoder(),
    );
    const id = snapshotId(view.tag, windowId);
    if (!this.cache.has(id)) {
      this.cache.set(id, this.fetcher.fetch(view.tag, windowId));
    }
    return this.cache.get(id);
  }
}

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

interface PromiseWrapper<T> {
  type: "promise";
  promise: Promise<T>;
}

interface ValueWrapper<T> {
  type: "value";
  value: T;
}

// We want to avoid promises when not needed (e.g. for a cache hit) as they
// have to bubble all the way up the stack.
export type MaybePromise<T> = PromiseWrapper<T> | ValueWrapper<T>;

export function valueOf<T>(value: T): MaybePromise<T> {
  return { type: "value", value };
}

export async function resolve<T>(maybePromise: MaybePromise<T>): Promise<T> {
  return maybePromise.type === "value"
    ? maybePromise.value
    : await maybePromise.promise;
}

/**
 * Durable per-key state. Cells are addressed by an encoded key and a
 * namespace within it; list cells support appending without a read.
 */
export interface StateStore {
  get(key: string, namespace: string): MaybePromise<Uint8Array | undefined>;
  put(key: string, namespace: string, data: Uint8Array): MaybePromise<void>;
  delete(key: string, namespace: string): MaybePromise<void>;
  listAppend(
    key: string,
    namespace: string,
    data: Uint8Array[],
  ): MaybePromise<void>;
  listRead(key: string, namespace: string): MaybePromise<Uint8Array[]>;
  listDelete(key: string, namespace: string): MaybePromise<void>;
}

export class InMemoryStateStore implements StateStore {
  private values: Map<string, Uint8Array> = new Map();
  private lists: Map<string, Uint8Array[]> = new Map();

  get(key: string, namespace: string) {
    return valueOf(this.values.get(cellId(key, namespace)));
  }

  put(key: string, namespace: string, data: Uint8Array) {
    this.values.set(cellId(key, namespace), data);
    return valueOf(undefined);
  }

  delete(key: string, namespace: string) {
    this.values.delete(cellId(key, namespace));
    return valueOf(undefined);
  }

  listAppend(key: string, namespace: string, data: Uint8Array[]) {
    const id = cellId(key, namespace);
    const existing = this.lists.get(id);
    if (existing === undefined) {
      this.lists.set(id, [...data]);
    } else {
      existing.push(...data);
    }
    return valueOf(undefined);
  }

  listRead(key: string, namespace: string) {
    return valueOf([...(this.lists.get(cellId(key, namespace)) ?? [])]);
  }

  listDelete(key: string, namespace: string) {
    this.lists.delete(cellId(key, namespace));
    return valueOf(undefined);
  }

  isEmpty(): boolean {
    return this.values.size === 0 && this.lists.size === 0;
  }
}

function cellId(key: string, namespace: string) {
  return key + "/" + namespace;
}

interface ListOverlay {
  cleared: boolean;
  appended: Uint8Array[];
}

/**
 * The view of one key's state from inside a work item. Reads see the work
 * item's own writes; nothing reaches the store until `commit`.
 */
export class WorkItemState {
  private values: Map<string, Uint8Array | undefined> = new Map();
  private lists: Map<string, ListOverlay> = new Map();
  private done = false;

  constructor(
    private store: StateStore,
    public readonly key: string,
  ) {}

  async get(namespace: string): Promise<Uint8Array | undefined> {
    this.checkOpen();
    if (this.values.has(namespace)) {
      return this.values.get(namespace);
    }
    return await resolve(this.store.get(this.key, namespace));
  }

  put(namespace: string, data: Uint8Array) {
    this.checkOpen();
    this.values.set(namespace, data);
  }

  delete(namespace: string) {
    this.checkOpen();
    this.values.set(namespace, undefined);
  }

  async readValue<T>(
    namespace: string,
    coder: Coder<T>,
  ): Promise<T | undefined> {
    const data = await this.get(namespace);
    return data === undefined ? undefined : decodeFromBytes(data, coder);
  }

  writeValue<T>(namespace: string, coder: Coder<T>, value: T) {
    this.put(namespace, encodeToBytes(value, coder));
  }

  async listRead(namespace: string): Promise<Uint8Array[]> {
    this.checkOpen();
    const overlay = this.lists.get(namespace);
    if (overlay?.cleared) {
      return [...overlay.appended];
    }
    const stored = await resolve(this.store.listRead(this.key, namespace));
    return overlay === undefined ? stored : stored.concat(overlay.appended);
  }

  listAppend(namespace: string, data: Uint8Array) {
    this.overlay(namespace).appended.push(data);
  }

  listDelete(namespace: string) {
    this.checkOpen();
    this.lists.set(namespace, { cleared: true, appended: [] });
  }

  /** Writes every buffered change to the store. */
  async commit(): Promise<void> {
    this.checkOpen();
    this.done = true;
    for (const [namespace, data] of this.values) {
      await resolve(
        data === undefined
          ? this.store.delete(this.key, namespace)
          : this.store.put(this.key, namespace, data),
      );
    }
    for (const [namespace, overlay] of this.lists) {
      if (overlay.cleared) {
        await resolve(this.store.listDelete(this.key, namespace));
      }
      if (overlay.appended.length > 0) {
        await resolve(
          this.store.listAppend(this.key, namespace, overlay.appended),
        );
      }
    }
  }

  /** Drops every buffered change. */
  abandon() {
    this.done = true;
    this.values.clear();
    this.lists.clear();
  }

  private overlay(namespace: string): ListOverlay {
    this.checkOpen();
    let overlay = this.lists.get(namespace);
    if (overlay === undefined) {
      overlay = { cleared: false, appended: [] };
      this.lists.set(namespace, overlay);
    }
    return overlay;
  }

  private checkOpen() {
    if (this.done) {
      throw new Error(`State for key ${this.key} was already committed.`);
    }
  }
}

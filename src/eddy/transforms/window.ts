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

import { WindowCoder } from "../coders/coders";
import { ConfigurationError } from "../internal/errors";
import { Instant, Window } from "../values";

/** A serializable reference to a function: a urn and its parameters. */
export interface FunctionSpec {
  urn: string;
  payload: Uint8Array;
}

export interface MergeResult<W extends Window> {
  toBeMerged: W[];
  mergeResult: W;
}

export interface WindowFn<W extends Window> {
  assignWindows(timestamp: Instant): W[];
  windowCoder(): WindowCoder<W>;
  toSpec(): FunctionSpec;
  isMerging(): boolean;
  /**
   * For merging window functions, the merges to apply to the given set of
   * active windows. Windows left out of every result stay as they are.
   */
  mergeWindows(windows: W[]): MergeResult<W>[];
  /** The window of a side input read from a main input in `mainWindow`. */
  getSideInputWindow(mainWindow: Window): W;
  windowFnName?: string;
}

const windowFnsByUrn = new Map<
  string,
  (payload: Uint8Array) => WindowFn<Window>
>();

/**
 * Makes a window function decodable from its spec, so that serialized
 * windowing strategies using it can be rebuilt elsewhere.
 */
export function registerWindowFn(
  urn: string,
  fromPayload: (payload: Uint8Array) => WindowFn<Window>,
) {
  windowFnsByUrn.set(urn, fromPayload);
}

export function windowFnFromSpec(spec: FunctionSpec): WindowFn<Window> {
  const constructor = windowFnsByUrn.get(spec.urn);
  if (constructor === undefined) {
    throw new ConfigurationError("Unknown window function " + spec.urn);
  }
  return constructor(spec.payload);
}

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

import { AsyncLocalStorage } from "node:async_hooks";

export interface LoggingStageInfo {
  workItemId?: string;
  transformId?: string;
  key?: string;
}

export const loggingLocalStorage = new AsyncLocalStorage<LoggingStageInfo>();

/** Runs `fn` with `info` attached to every log line it produces. */
export function withLoggingStageInfo<T>(
  info: LoggingStageInfo,
  fn: () => T,
): T {
  return loggingLocalStorage.run(info, fn);
}

export function stageLogPrefix(): string {
  const stageInfo = loggingLocalStorage.getStore();
  if (stageInfo === undefined) {
    return "";
  }
  const parts: string[] = [];
  if (stageInfo.transformId !== undefined) {
    parts.push(stageInfo.transformId);
  }
  if (stageInfo.workItemId !== undefined) {
    parts.push("work item " + stageInfo.workItemId);
  }
  if (stageInfo.key !== undefined) {
    parts.push("key " + stageInfo.key);
  }
  return parts.length > 0 ? `[${parts.join(" ")}] ` : "";
}

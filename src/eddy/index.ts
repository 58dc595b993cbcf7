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

export * from "./values";
export * from "./coders/coders";
export * from "./coders/standard_coders";
export * from "./coders/js_coders";
export * from "./internal/errors";
export * from "./transforms/window";
export * from "./transforms/windowings";
export * from "./transforms/triggers";
export * from "./transforms/windowing_strategy";
export * from "./transforms/group_and_combine";
export * as combiners from "./transforms/combiners";
export * from "./worker/state";
export * from "./worker/timers";
export * from "./worker/watermarks";
export * from "./worker/metrics";
export * from "./worker/trigger_state_machine";
export * from "./worker/pane_accumulator";
export * from "./worker/side_inputs";
export * from "./worker/group_also_by_window";
export * from "./worker/operators";
export * from "./runners/direct_runner";
export * as urns from "./internal/urns";

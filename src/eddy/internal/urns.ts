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

export const GLOBAL_WINDOWS_URN = "eddy:window_fn:global_windows:v1";
export const FIXED_WINDOWS_URN = "eddy:window_fn:fixed_windows:v1";
export const SLIDING_WINDOWS_URN = "eddy:window_fn:sliding_windows:v1";
export const SESSION_WINDOWS_URN = "eddy:window_fn:session_windows:v1";

export const WINDOWING_STRATEGY_VERSION = 1;

export const ELEMENTS_PROCESSED = "eddy:metric:elements_processed:v1";
export const DROPPED_DUE_TO_LATENESS = "eddy:metric:dropped_due_to_lateness:v1";
export const DROPPED_DUE_TO_CLOSED_WINDOW =
  "eddy:metric:dropped_due_to_closed_window:v1";
export const PANES_EMITTED = "eddy:metric:panes_emitted:v1";
export const STALE_TIMERS = "eddy:metric:stale_timers:v1";
export const WORK_ITEM_RETRIES = "eddy:metric:work_item_retries:v1";
export const PANE_SIZE = "eddy:metric:pane_size:v1";

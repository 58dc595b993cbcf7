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

import { Coder } from "../coders/coders";

/**
 * An incremental aggregation. Accumulators for one window are merged when
 * windows merge and when partial results meet, so `addInput` and
 * `mergeAccumulators` must be associative and commutative.
 */
export interface CombineFn<I, A, O> {
  createAccumulator: () => A;
  addInput: (accumulator: A, input: I) => A;
  mergeAccumulators: (accumulators: Iterable<A>) => A;
  extractOutput: (accumulator: A) => O;
  accumulatorCoder?(inputCoder: Coder<I>): Coder<A>;
}

/**
 * The merge half of a combine whose inputs are already accumulators, as when
 * partial aggregates computed before a shuffle are grouped by window.
 */
export function mergingCombineFn<I, A, O>(
  combineFn: CombineFn<I, A, O>,
  accumulatorCoder?: Coder<A>,
): CombineFn<A, A, O> {
  return {
    createAccumulator: () => combineFn.createAccumulator(),
    addInput: (accumulator, input) =>
      combineFn.mergeAccumulators([accumulator, input]),
    mergeAccumulators: (accumulators) =>
      combineFn.mergeAccumulators(accumulators),
    extractOutput: (accumulator) => combineFn.extractOutput(accumulator),
    accumulatorCoder: (inputCoder: Coder<A>) => accumulatorCoder ?? inputCoder,
  };
}

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

import { CombineFn } from "./group_and_combine";
import { Coder } from "../coders/coders";
import { VarIntCoder } from "../coders/standard_coders";

export const count: CombineFn<unknown, number, number> = {
  createAccumulator: () => 0,
  addInput: (acc, i) => acc + 1,
  mergeAccumulators: (accumulators: Iterable<number>) =>
    [...accumulators].reduce((prev, current) => prev + current, 0),
  extractOutput: (acc) => acc,
  accumulatorCoder: () => new VarIntCoder(),
};

export const sum: CombineFn<number, number, number> = {
  createAccumulator: () => 0,
  addInput: (acc: number, i: number) => acc + i,
  mergeAccumulators: (accumulators: Iterable<number>) =>
    [...accumulators].reduce((prev, current) => prev + current, 0),
  extractOutput: (acc: number) => acc,
  accumulatorCoder: (inputCoder: Coder<number>) => inputCoder,
};

// Accumulators hold null rather than undefined so that they survive encoding.
export const max: CombineFn<number, number | null, number | null> = {
  createAccumulator: () => null,
  addInput: (acc, i) => (acc === null || acc < i ? i : acc),
  mergeAccumulators: (accumulators: Iterable<number | null>) =>
    [...accumulators].reduce<number | null>(
      (a, b) => (b === null || (a !== null && a >= b) ? a : b),
      null,
    ),
  extractOutput: (acc) => acc,
};

export const min: CombineFn<number, number | null, number | null> = {
  createAccumulator: () => null,
  addInput: (acc, i) => (acc === null || acc > i ? i : acc),
  mergeAccumulators: (accumulators: Iterable<number | null>) =>
    [...accumulators].reduce<number | null>(
      (a, b) => (b === null || (a !== null && a <= b) ? a : b),
      null,
    ),
  extractOutput: (acc) => acc,
};

export const mean: CombineFn<number, [number, number], number> = {
  createAccumulator: () => [0, 0],
  addInput: ([sum, count]: [number, number], i: number) => [sum + i, count + 1],
  mergeAccumulators: (accumulators: Iterable<[number, number]>) =>
    [...accumulators].reduce<[number, number]>(
      ([sum0, count0], [sum1, count1]) => [sum0 + sum1, count0 + count1],
      [0, 0],
    ),
  extractOutput: ([sum, count]: [number, number]) => sum / count,
};

export function toArray<T>(): CombineFn<T, T[], T[]> {
  return {
    createAccumulator: () => [],
    addInput: (acc, i) => [...acc, i],
    mergeAccumulators: (accumulators: Iterable<T[]>) => {
      const result: T[] = [];
      for (const acc of accumulators) {
        result.push(...acc);
      }
      return result;
    },
    extractOutput: (acc) => acc,
  };
}

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

export interface DistributionResult {
  count: number;
  sum: number;
  min: number;
  max: number;
}

/**
 * A MetricCell holds the concrete value of a metric at runtime.
 */
interface MetricCell<T, R> {
  update(value: T): void;
  reset(): void;
  merge(other: MetricCell<T, R>): void;
  extract(): R;
}

class Counter implements MetricCell<number, number> {
  private value = 0;

  update(value: number) {
    this.value += value;
  }

  reset(): void {
    this.value = 0;
  }

  merge(other: Counter) {
    this.value += other.value;
  }

  extract() {
    return this.value;
  }
}

class Distribution implements MetricCell<number, DistributionResult> {
  private count = 0;
  private sum = 0;
  private min = 0;
  private max = 0;

  update(value: number) {
    if (this.count == 0) {
      this.count = 1;
      this.sum = this.min = this.max = value;
    } else {
      this.count += 1;
      this.sum += value;
      this.min = Math.min(value, this.min);
      this.max = Math.max(value, this.max);
    }
  }

  reset(): void {
    this.count = 0;
  }

  merge(other: Distribution) {
    if (other.count == 0) {
      return;
    } else if (this.count == 0) {
      this.count = other.count;
      this.sum = other.sum;
      this.min = other.min;
      this.max = other.max;
    } else {
      this.count += other.count;
      this.sum += other.sum;
      this.min = Math.min(this.min, other.min);
      this.max = Math.max(this.max, other.max);
    }
  }

  extract(): DistributionResult {
    if (this.count == 0) {
      return {
        count: 0,
        sum: 0,
        min: NaN,
        max: NaN,
      };
    } else {
      return {
        count: this.count,
        sum: this.sum,
        min: this.min,
        max: this.max,
      };
    }
  }
}

/**
 * A MetricsContainer holds a set of metrics for a work item or a whole run.
 *
 * Work items record into their own container, which is merged into the
 * run's container only when the work item commits.
 */
export class MetricsContainer {
  private counters = new Map<string, Counter>();
  private distributions = new Map<string, Distribution>();

  counter(name: string): { update: (value: number) => void } {
    let cell = this.counters.get(name);
    if (cell === undefined) {
      cell = new Counter();
      this.counters.set(name, cell);
    }
    return cell;
  }

  distribution(name: string): { update: (value: number) => void } {
    let cell = this.distributions.get(name);
    if (cell === undefined) {
      cell = new Distribution();
      this.distributions.set(name, cell);
    }
    return cell;
  }

  getCounter(name: string): number {
    return this.counters.get(name)?.extract() ?? 0;
  }

  getDistribution(name: string): DistributionResult {
    return (this.distributions.get(name) ?? new Distribution()).extract();
  }

  counterNames(): string[] {
    return [...this.counters.keys()].sort();
  }

  merge(other: MetricsContainer) {
    for (const [name, cell] of other.counters) {
      this.counters.set(
        name,
        mergeInto(this.counters.get(name), cell, Counter),
      );
    }
    for (const [name, cell] of other.distributions) {
      this.distributions.set(
        name,
        mergeInto(this.distributions.get(name), cell, Distribution),
      );
    }
  }

  reset(): void {
    for (const cell of this.counters.values()) {
      cell.reset();
    }
    for (const cell of this.distributions.values()) {
      cell.reset();
    }
  }
}

function mergeInto<C extends MetricCell<number, unknown>>(
  existing: C | undefined,
  other: C,
  create: new () => C,
): C {
  const result = existing ?? new create();
  result.merge(other);
  return result;
}

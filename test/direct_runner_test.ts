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

import * as assert from "assert";
import Long from "long";

import {
  StrUtf8Coder,
  VarIntCoder,
} from "../src/eddy/coders/standard_coders";
import { GeneralObjectCoder } from "../src/eddy/coders/js_coders";
import { ConfigurationError, WorkItemError } from "../src/eddy/internal/errors";
import {
  ELEMENTS_PROCESSED,
  WORK_ITEM_RETRIES,
} from "../src/eddy/internal/urns";
import { directRunner } from "../src/eddy/runners/direct_runner";
import * as combiners from "../src/eddy/transforms/combiners";
import { CombineFn } from "../src/eddy/transforms/group_and_combine";
import {
  afterProcessingTime,
  repeatedly,
} from "../src/eddy/transforms/triggers";
import { windowingStrategy } from "../src/eddy/transforms/windowing_strategy";
import { fixedWindows, sessions } from "../src/eddy/transforms/windowings";
import {
  summarizePane,
  WindowingTester,
} from "../src/eddy/testing/windowing_tester";
import { assertContainsInAnyOrder } from "../src/eddy/testing/assert";
import { GroupAlsoByWindowReducer } from "../src/eddy/worker/group_also_by_window";
import { CombiningAccumulator } from "../src/eddy/worker/pane_accumulator";
import { SideInputView } from "../src/eddy/worker/side_inputs";
import { IntervalWindow, TimeDomain } from "../src/eddy/values";

const keys = StrUtf8Coder.INSTANCE;
const values = VarIntCoder.INSTANCE;

// A sum whose addInput throws on the calls for which `fails` is true.
function flakySum(
  fails: (call: number) => boolean,
): CombineFn<number, number, number> {
  let calls = 0;
  return {
    ...combiners.sum,
    addInput: (accumulator, input) => {
      calls += 1;
      if (fails(calls)) {
        throw new Error(`addInput call ${calls} failed`);
      }
      return accumulator + input;
    },
  };
}

function sumReducer() {
  return new GroupAlsoByWindowReducer<string, number, number, IntervalWindow>(
    windowingStrategy(fixedWindows(10)),
    new CombiningAccumulator(combiners.sum, values),
  );
}

describe("direct runner", function () {
  it("runs a script of elements and watermarks", async function () {
    const runner = directRunner(sumReducer(), {
      keyCoder: keys,
      valueCoder: values,
      bundleSize: 2,
      splitFraction: 0.5,
    });
    const element = (key: string, value: number, timestamp: number) => ({
      type: "element" as const,
      key,
      value,
      timestamp: Long.fromValue(timestamp),
    });
    const result = await runner.run([
      element("a", 1, 1),
      element("a", 2, 2),
      element("b", 3, 3),
      element("a", 4, 12),
      element("b", 5, 15),
      { type: "watermark", watermark: Long.fromValue(100) },
    ]);
    assertContainsInAnyOrder(
      result.panes.map(summarizePane).map((p) => [p.key, p.window, p.value]),
      [
        ["a", "[0, 10)", 3],
        ["a", "[10, 20)", 4],
        ["b", "[0, 10)", 3],
        ["b", "[10, 20)", 5],
      ],
    );
    assert.strictEqual(result.metrics.getCounter(ELEMENTS_PROCESSED), 5);
    assert.strictEqual(result.watermarkHold, undefined);
    assert.strictEqual(result.outputWatermark.toNumber(), 100);
  });

  it("reads processing time from its clock before every bundle", async function () {
    let now = 1000;
    const runner = directRunner(
      new GroupAlsoByWindowReducer<string, number, number, IntervalWindow>(
        windowingStrategy(fixedWindows(100), {
          trigger: repeatedly(afterProcessingTime(5)),
        }),
        new CombiningAccumulator(combiners.sum, values),
      ),
      { keyCoder: keys, valueCoder: values, clock: () => Long.fromValue(now) },
    );
    const result = await runner.run([
      { type: "element", key: "k", value: 7, timestamp: Long.fromValue(1) },
      { type: "processingTime", time: Long.fromValue(1004) },
    ]);
    assert.deepStrictEqual(result.panes, []);

    now = 1005;
    await runner.advanceProcessingTime(Long.fromValue(now));
    assert.deepStrictEqual(
      runner.takeOutputs().map((p) => p.value),
      [{ key: "k", value: 7 }],
    );
  });

  it("fires timers that the clock makes due before the next bundle", async function () {
    let now = 1000;
    const runner = directRunner(
      new GroupAlsoByWindowReducer<string, number, number, IntervalWindow>(
        windowingStrategy(fixedWindows(100), {
          trigger: repeatedly(afterProcessingTime(5)),
        }),
        new CombiningAccumulator(combiners.sum, values),
      ),
      { keyCoder: keys, valueCoder: values, clock: () => Long.fromValue(now) },
    );
    await runner.processElements([
      { key: "k", value: 7, timestamp: Long.fromValue(1) },
    ]);
    assert.deepStrictEqual(runner.takeOutputs(), []);

    now = 1010;
    await runner.processElements([
      { key: "other", value: 1, timestamp: Long.fromValue(2) },
    ]);
    assert.deepStrictEqual(
      runner.takeOutputs().map((p) => p.value),
      [{ key: "k", value: 7 }],
    );
    assert.deepStrictEqual(
      runner.timers
        .pendingTimers()
        .filter((t) => t.domain === TimeDomain.PROCESSING_TIME)
        .map((t) => t.timestamp.toNumber()),
      [1015],
    );
  });

  it("retries failed work items without applying their partial state", async function () {
    const tester = WindowingTester.combining(
      windowingStrategy(fixedWindows(10)),
      flakySum((call) => call === 2),
      keys,
      values,
    );
    await tester.injectElements("k", [1, 1], [2, 2]);
    assert.strictEqual(tester.counter(WORK_ITEM_RETRIES), 1);
    assert.strictEqual(tester.counter(ELEMENTS_PROCESSED), 2);

    await tester.advanceInputWatermark(10);
    assert.deepStrictEqual(
      tester.extractPanes().map((p) => p.value),
      [3],
    );
  });

  it("reads the latest side input version when retrying", async function () {
    const view: SideInputView<string[]> = {
      tag: "versions",
      windowFn: fixedWindows(10),
      coder: new GeneralObjectCoder<string[]>(),
    };
    const seen: (string[] | undefined)[] = [];
    let republish = () => {};
    const tester = WindowingTester.combining(
      windowingStrategy(fixedWindows(10)),
      combiners.sum,
      keys,
      values,
      {
        elementFilter: (element, window, { sideInputs }) => {
          seen.push(sideInputs.get(view, window));
          if (seen.length === 1) {
            republish();
            throw new Error("first attempt fails");
          }
          return true;
        },
      },
    );
    const window = new IntervalWindow(Long.fromValue(0), Long.fromValue(10));
    tester.publishSideInput(view, window, ["v1"]);
    republish = () => {
      tester.publishSideInput(view, window, ["v2"]);
    };

    await tester.injectElements("k", [1, 1]);
    assert.deepStrictEqual(seen, [["v1"], ["v2"]]);
    assert.strictEqual(tester.counter(WORK_ITEM_RETRIES), 1);
  });

  it("gives up after the configured number of attempts", async function () {
    const tester = WindowingTester.combining(
      windowingStrategy(fixedWindows(10)),
      flakySum(() => true),
      keys,
      values,
      { maxWorkItemAttempts: 2 },
    );
    await assert.rejects(tester.injectElements("k", [1, 1]), (error) => {
      assert.ok(error instanceof WorkItemError);
      assert.strictEqual(error.key, "aw==");
      assert.strictEqual(error.attempts, 2);
      assert.ok(error.cause instanceof Error);
      assert.strictEqual(error.cause.message, "addInput call 2 failed");
      return true;
    });
    assert.strictEqual(tester.counter(WORK_ITEM_RETRIES), 1);
    assert.strictEqual(tester.counter(ELEMENTS_PROCESSED), 0);
    assert.strictEqual(tester.isStateEmpty(), true);
    assert.deepStrictEqual(tester.pendingTimers(), []);
    assert.strictEqual(tester.getWatermarkHold(), undefined);
  });

  it("keeps the timers of a work item that failed", async function () {
    const tester = WindowingTester.combining(
      windowingStrategy(fixedWindows(10)),
      {
        ...combiners.sum,
        extractOutput: () => {
          throw new Error("cannot extract");
        },
      },
      keys,
      values,
      { maxWorkItemAttempts: 1 },
    );
    await tester.injectElements("k", [1, 1]);
    await assert.rejects(tester.advanceInputWatermark(10), WorkItemError);
    assert.deepStrictEqual(
      tester.pendingTimers().map((t) => t.timestamp.toNumber()),
      [9],
    );
    assert.strictEqual(tester.getWatermarkHold()?.toNumber(), 9);
  });

  it("does not retry configuration errors", async function () {
    const sessionView: SideInputView<number> = {
      tag: "sessions",
      windowFn: sessions(10),
      coder: values,
    };
    const tester = WindowingTester.combining(
      windowingStrategy(fixedWindows(10)),
      combiners.sum,
      keys,
      values,
      {
        elementFilter: (element, window, { sideInputs }) =>
          sideInputs.get(sessionView, window) === undefined,
      },
    );
    await assert.rejects(
      tester.injectElements("k", [1, 1]),
      ConfigurationError,
    );
    assert.strictEqual(tester.counter(WORK_ITEM_RETRIES), 0);
  });

  it("rejects bundle sizes and attempts below one", function () {
    assert.throws(
      () =>
        directRunner(sumReducer(), {
          keyCoder: keys,
          valueCoder: values,
          bundleSize: 0,
        }),
      ConfigurationError,
    );
    assert.throws(
      () =>
        directRunner(sumReducer(), {
          keyCoder: keys,
          valueCoder: values,
          maxWorkItemAttempts: 0,
        }),
      ConfigurationError,
    );
  });
});

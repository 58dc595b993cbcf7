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
import { Writer } from "protobufjs";

import { ConfigurationError } from "../src/eddy/internal/errors";
import { windowFnFromSpec } from "../src/eddy/transforms/window";
import {
  fixedWindows,
  globalWindows,
  mergeOverlappingIntervalWindows,
  sessions,
  slidingWindows,
} from "../src/eddy/transforms/windowings";
import {
  afterAll,
  afterCount,
  afterEach,
  afterProcessingTime,
  afterWatermark,
  customTrigger,
  defaultTrigger,
  isOnce,
  orFinally,
  registerTriggerFn,
  repeatedly,
  triggerToString,
} from "../src/eddy/transforms/triggers";
import {
  AccumulationMode,
  ClosingBehavior,
  MergedTriggerFinishing,
  OutputTime,
  decodeWindowingStrategy,
  encodeWindowingStrategy,
  garbageCollectionTime,
  windowingStrategy,
} from "../src/eddy/transforms/windowing_strategy";
import {
  GLOBAL_WINDOW_MAX_TIMESTAMP,
  GlobalWindow,
  IntervalWindow,
  Window,
} from "../src/eddy/values";

function interval(start: number, end: number) {
  return new IntervalWindow(Long.fromValue(start), Long.fromValue(end));
}

function names(windows: Window[]) {
  return windows.map((w) => w.toString());
}

registerTriggerFn("test:unmergeable", {
  isOnce: () => true,
  canMerge: () => false,
  onElement: () => {},
  onMerge: () => {},
  shouldFire: () => false,
  onFire: () => {},
});

describe("window functions", function () {
  it("assigns fixed windows", function () {
    const windowFn = fixedWindows(10);
    assert.deepStrictEqual(names(windowFn.assignWindows(Long.fromValue(15))), [
      "[10, 20)",
    ]);
    assert.deepStrictEqual(names(windowFn.assignWindows(Long.fromValue(-3))), [
      "[-10, 0)",
    ]);
    assert.deepStrictEqual(
      names(fixedWindows(10, 3).assignWindows(Long.fromValue(2))),
      ["[-7, 3)"],
    );
  });

  it("assigns every sliding window containing the timestamp", function () {
    const windowFn = slidingWindows(10, 5);
    assert.deepStrictEqual(names(windowFn.assignWindows(Long.fromValue(7))), [
      "[5, 15)",
      "[0, 10)",
    ]);
  });

  it("starts a session at each element", function () {
    const windowFn = sessions(10);
    assert.deepStrictEqual(names(windowFn.assignWindows(Long.fromValue(5))), [
      "[5, 15)",
    ]);
    assert.strictEqual(windowFn.isMerging(), true);
    assert.strictEqual(fixedWindows(10).isMerging(), false);
  });

  it("assigns everything to the global window", function () {
    const windows = globalWindows().assignWindows(Long.fromValue(123));
    assert.strictEqual(windows.length, 1);
    assert.ok(windows[0] instanceof GlobalWindow);
  });

  describe("merging overlapping windows", function () {
    it("merges transitively overlapping sessions into their span", function () {
      const merges = sessions(10).mergeWindows([
        interval(25, 35),
        interval(10, 20),
        interval(1, 11),
      ]);
      assert.strictEqual(merges.length, 1);
      assert.deepStrictEqual(names(merges[0].toBeMerged), [
        "[1, 11)",
        "[10, 20)",
      ]);
      assert.strictEqual(merges[0].mergeResult.toString(), "[1, 20)");
    });

    it("leaves windows that merely touch apart", function () {
      const merges = mergeOverlappingIntervalWindows([
        interval(1, 5),
        interval(4, 8),
        interval(8, 10),
        interval(20, 30),
      ]);
      assert.deepStrictEqual(
        merges.map((m) => m.mergeResult.toString()),
        ["[1, 8)"],
      );
    });

    it("returns nothing when no windows overlap", function () {
      assert.deepStrictEqual(
        mergeOverlappingIntervalWindows([interval(0, 5), interval(5, 10)]),
        [],
      );
    });
  });

  it("rejects sizes, periods, gaps and offsets out of range", function () {
    assert.throws(() => fixedWindows(0), {
      name: "ConfigurationError",
      message: "fixedWindows size must be positive, got 0",
    });
    assert.throws(() => fixedWindows(10, 10), ConfigurationError);
    assert.throws(() => slidingWindows(10, -5), ConfigurationError);
    assert.throws(() => slidingWindows(10, 5, 5), ConfigurationError);
    assert.throws(() => sessions(0), ConfigurationError);
  });

  describe("side input windows", function () {
    it("maps a main window to the side input window holding its end", function () {
      assert.strictEqual(
        fixedWindows(10).getSideInputWindow(interval(3, 13)).toString(),
        "[10, 20)",
      );
      assert.strictEqual(
        slidingWindows(10, 5).getSideInputWindow(interval(0, 7)).toString(),
        "[5, 15)",
      );
      assert.ok(
        globalWindows().getSideInputWindow(interval(0, 7)) instanceof
          GlobalWindow,
      );
    });

    it("refuses session windows", function () {
      assert.throws(
        () => sessions(10).getSideInputWindow(interval(0, 7)),
        ConfigurationError,
      );
    });
  });

  it("rebuilds window functions from their specs", function () {
    const windowFn = windowFnFromSpec(fixedWindows(10, 3).toSpec());
    assert.strictEqual(windowFn.windowFnName, "fixedWindows(10, 3)");
    assert.deepStrictEqual(names(windowFn.assignWindows(Long.fromValue(2))), [
      "[-7, 3)",
    ]);
    assert.strictEqual(
      windowFnFromSpec(sessions(30).toSpec()).windowFnName,
      "sessions(30)",
    );
    assert.throws(
      () =>
        windowFnFromSpec({ urn: "test:no_such_windows", payload: new Uint8Array() }),
      { name: "ConfigurationError", message: "Unknown window function test:no_such_windows" },
    );
  });
});

describe("triggers", function () {
  it("knows which triggers fire only once", function () {
    assert.strictEqual(isOnce(afterCount(1)), true);
    assert.strictEqual(isOnce(afterWatermark()), true);
    assert.strictEqual(isOnce(afterWatermark({ late: afterCount(1) })), false);
    assert.strictEqual(isOnce(repeatedly(afterCount(1))), false);
    assert.strictEqual(isOnce(orFinally(afterCount(2), afterCount(3))), true);
    assert.strictEqual(isOnce(defaultTrigger()), false);
  });

  it("describes triggers", function () {
    assert.strictEqual(
      triggerToString(
        afterWatermark({
          early: afterProcessingTime(5),
          late: afterCount(1),
        }),
      ),
      "afterWatermark(early: afterProcessingTime(5), late: afterCount(1))",
    );
    assert.strictEqual(
      triggerToString(orFinally(repeatedly(afterCount(2)), afterCount(9))),
      "orFinally(repeatedly(afterCount(2)), afterCount(9))",
    );
  });

  it("rejects triggers that cannot run", function () {
    const fixed = fixedWindows(10);
    assert.throws(() => windowingStrategy(fixed, { trigger: afterCount(0) }), {
      name: "ConfigurationError",
      message: "afterCount requires a positive integer count, got 0",
    });
    assert.throws(
      () =>
        windowingStrategy(fixed, {
          trigger: afterAll(repeatedly(afterCount(1))),
        }),
      {
        name: "ConfigurationError",
        message:
          "afterAll must be a trigger that fires once, got repeatedly(afterCount(1))",
      },
    );
    assert.throws(
      () =>
        windowingStrategy(fixed, {
          trigger: afterWatermark({ early: repeatedly(afterCount(1)) }),
        }),
      ConfigurationError,
    );
    assert.throws(
      () => windowingStrategy(fixed, { trigger: afterEach() }),
      ConfigurationError,
    );
    assert.throws(
      () =>
        windowingStrategy(fixed, {
          trigger: orFinally(afterCount(1), repeatedly(afterCount(1))),
        }),
      ConfigurationError,
    );
  });

  it("rejects unmergeable triggers only for merging windows", function () {
    const trigger = customTrigger("test:unmergeable");
    assert.throws(
      () => windowingStrategy(sessions(10), { trigger }),
      {
        name: "ConfigurationError",
        message:
          "Trigger test:unmergeable() cannot be used with a merging window function",
      },
    );
    assert.strictEqual(
      windowingStrategy(fixedWindows(10), { trigger }).trigger,
      trigger,
    );
  });

  it("refuses unregistered custom triggers", function () {
    assert.throws(
      () => customTrigger("test:not_registered"),
      ConfigurationError,
    );
  });
});

describe("windowing strategies", function () {
  it("fills in defaults", function () {
    const strategy = windowingStrategy(globalWindows());
    assert.deepStrictEqual(strategy.trigger, defaultTrigger());
    assert.strictEqual(strategy.accumulationMode, AccumulationMode.DISCARDING);
    assert.strictEqual(strategy.allowedLateness.toNumber(), 0);
    assert.strictEqual(strategy.outputTime, OutputTime.END_OF_WINDOW);
    assert.strictEqual(
      strategy.closingBehavior,
      ClosingBehavior.FIRE_IF_NON_EMPTY,
    );
    assert.strictEqual(
      strategy.mergedTriggerFinishing,
      MergedTriggerFinishing.ANY,
    );
  });

  it("rejects negative allowed lateness", function () {
    assert.throws(
      () => windowingStrategy(fixedWindows(10), { allowedLateness: -1 }),
      {
        name: "ConfigurationError",
        message: "Allowed lateness must not be negative, got -1",
      },
    );
  });

  it("collects garbage after the allowed lateness", function () {
    assert.strictEqual(
      garbageCollectionTime(interval(0, 10), Long.fromValue(5)).toNumber(),
      14,
    );
    assert.ok(
      garbageCollectionTime(new GlobalWindow(), Long.fromValue(1000)).eq(
        GLOBAL_WINDOW_MAX_TIMESTAMP,
      ),
    );
  });

  it("survives encoding", function () {
    const strategy = windowingStrategy(fixedWindows(10), {
      trigger: afterWatermark({
        early: afterProcessingTime(5),
        late: afterCount(1),
      }),
      accumulationMode: AccumulationMode.ACCUMULATING,
      allowedLateness: 100,
      outputTime: OutputTime.EARLIEST_IN_PANE,
      closingBehavior: ClosingBehavior.FIRE_ALWAYS,
      mergedTriggerFinishing: MergedTriggerFinishing.ALL,
    });
    const decoded = decodeWindowingStrategy(encodeWindowingStrategy(strategy));
    assert.strictEqual(decoded.windowFn.windowFnName, "fixedWindows(10)");
    assert.strictEqual(
      triggerToString(decoded.trigger),
      "afterWatermark(early: afterProcessingTime(5), late: afterCount(1))",
    );
    assert.strictEqual(decoded.accumulationMode, AccumulationMode.ACCUMULATING);
    assert.strictEqual(decoded.allowedLateness.toNumber(), 100);
    assert.strictEqual(decoded.outputTime, OutputTime.EARLIEST_IN_PANE);
    assert.strictEqual(decoded.closingBehavior, ClosingBehavior.FIRE_ALWAYS);
    assert.strictEqual(
      decoded.mergedTriggerFinishing,
      MergedTriggerFinishing.ALL,
    );
  });

  it("refuses blobs of another version", function () {
    const blob = new Writer().int32(2).finish();
    assert.throws(() => decodeWindowingStrategy(blob), {
      name: "ConfigurationError",
      message: "Unsupported windowing strategy version 2",
    });
  });
});

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
  Trigger,
  TriggerState,
  afterAll,
  afterCount,
  afterEach,
  afterFirst,
  afterProcessingTime,
  afterWatermark,
  customTrigger,
  defaultTrigger,
  never,
  orFinally,
  registerTriggerFn,
  repeatedly,
} from "../src/eddy/transforms/triggers";
import { MergedTriggerFinishing } from "../src/eddy/transforms/windowing_strategy";
import {
  decodeFromBytes,
  encodeToBytes,
} from "../src/eddy/coders/coders";
import {
  TriggerEnvironment,
  TriggerResult,
  TriggerStateCoder,
  TriggerStateMachine,
} from "../src/eddy/worker/trigger_state_machine";
import { Instant, IntervalWindow, TimeDomain } from "../src/eddy/values";

const { CONTINUE, FIRE, FIRE_AND_FINISH } = TriggerResult;

interface RecordingEnvironment extends TriggerEnvironment {
  timers: [TimeDomain, number][];
  deletedTimers: [TimeDomain, number][];
}

// The window [0, 10), seen at the given watermark and processing time.
function environment(
  watermark: number,
  processingTime: number = 0,
): RecordingEnvironment {
  const timers: [TimeDomain, number][] = [];
  const deletedTimers: [TimeDomain, number][] = [];
  return {
    timers,
    deletedTimers,
    window: new IntervalWindow(Long.fromValue(0), Long.fromValue(10)),
    inputWatermark: Long.fromValue(watermark),
    processingTime: Long.fromValue(processingTime),
    setTimer: (domain: TimeDomain, timestamp: Instant) =>
      timers.push([domain, timestamp.toNumber()]),
    deleteTimer: (domain: TimeDomain, timestamp: Instant) =>
      deletedTimers.push([domain, timestamp.toNumber()]),
  };
}

function onElements(
  machine: TriggerStateMachine,
  env: TriggerEnvironment,
  state: TriggerState,
  count: number,
): TriggerResult[] {
  const results: TriggerResult[] = [];
  for (let i = 0; i < count; i++) {
    results.push(machine.onElement(env, state, Long.fromValue(i)));
  }
  return results;
}

function run(trigger: Trigger, env: TriggerEnvironment, count: number) {
  const machine = new TriggerStateMachine(trigger);
  const state = machine.initialState();
  return { results: onElements(machine, env, state, count), machine, state };
}

registerTriggerFn("test:every_second_element", {
  isOnce: () => false,
  canMerge: () => true,
  onElement: (context) => {
    context.state.count += 1;
  },
  onMerge: () => {},
  shouldFire: (context) => context.state.count >= 2,
  onFire: (context) => {
    context.state.count = 0;
  },
});

describe("trigger state machine", function () {
  describe("afterCount", function () {
    it("fires once at the count and then finishes", function () {
      const { results, state } = run(afterCount(2), environment(-1), 3);
      assert.deepStrictEqual(results, [CONTINUE, FIRE_AND_FINISH, CONTINUE]);
      assert.strictEqual(state.finished, true);
    });

    it("fires again and again when repeated", function () {
      const { results } = run(repeatedly(afterCount(2)), environment(-1), 4);
      assert.deepStrictEqual(results, [CONTINUE, FIRE, CONTINUE, FIRE]);
    });
  });

  describe("default trigger", function () {
    it("waits for the end of the window", function () {
      const env = environment(-1);
      const { results } = run(defaultTrigger(), env, 2);
      assert.deepStrictEqual(results, [CONTINUE, CONTINUE]);
      assert.deepStrictEqual(env.timers, [
        [TimeDomain.EVENT_TIME, 9],
        [TimeDomain.EVENT_TIME, 9],
      ]);
    });

    it("fires at the end of the window and for every late element", function () {
      const machine = new TriggerStateMachine(defaultTrigger());
      const state = machine.initialState();
      machine.onElement(environment(-1), state, Long.fromValue(3));

      const late = environment(10);
      assert.strictEqual(
        machine.onTimer(late, state, TimeDomain.EVENT_TIME, Long.fromValue(9)),
        FIRE,
      );
      assert.deepStrictEqual(onElements(machine, late, state, 2), [FIRE, FIRE]);
      assert.deepStrictEqual(late.timers, []);
      assert.strictEqual(state.finished, false);
    });
  });

  it("never fires a never trigger", function () {
    const { results } = run(never(), environment(100, 100), 3);
    assert.deepStrictEqual(results, [CONTINUE, CONTINUE, CONTINUE]);
  });

  describe("afterWatermark", function () {
    it("finishes at the end of the window without late firings", function () {
      const machine = new TriggerStateMachine(afterWatermark());
      const state = machine.initialState();
      const before = environment(5);
      assert.strictEqual(
        machine.onElement(before, state, Long.fromValue(1)),
        CONTINUE,
      );
      assert.deepStrictEqual(before.timers, [[TimeDomain.EVENT_TIME, 9]]);
      assert.strictEqual(
        machine.onTimer(before, state, TimeDomain.EVENT_TIME, Long.fromValue(9)),
        CONTINUE,
      );
      assert.strictEqual(
        machine.onTimer(
          environment(10),
          state,
          TimeDomain.EVENT_TIME,
          Long.fromValue(9),
        ),
        FIRE_AND_FINISH,
      );
    });

    it("fires early, on time and late", function () {
      const machine = new TriggerStateMachine(
        afterWatermark({ early: afterCount(2), late: afterCount(1) }),
      );
      const state = machine.initialState();
      assert.deepStrictEqual(onElements(machine, environment(0), state, 3), [
        CONTINUE,
        FIRE,
        CONTINUE,
      ]);
      assert.strictEqual(
        machine.onTimer(
          environment(10),
          state,
          TimeDomain.EVENT_TIME,
          Long.fromValue(9),
        ),
        FIRE,
      );
      assert.deepStrictEqual(onElements(machine, environment(10), state, 2), [
        FIRE,
        FIRE,
      ]);
      assert.strictEqual(state.finished, false);
    });
  });

  describe("afterProcessingTime", function () {
    it("fires once processing time passes the delay", function () {
      const machine = new TriggerStateMachine(afterProcessingTime(5));
      const state = machine.initialState();
      const env = environment(0, 100);
      assert.strictEqual(
        machine.onElement(env, state, Long.fromValue(1)),
        CONTINUE,
      );
      machine.onElement(environment(0, 102), state, Long.fromValue(2));
      assert.deepStrictEqual(env.timers, [[TimeDomain.PROCESSING_TIME, 105]]);
      assert.strictEqual(
        machine.onTimer(
          environment(0, 104),
          state,
          TimeDomain.PROCESSING_TIME,
          Long.fromValue(105),
        ),
        CONTINUE,
      );
      assert.strictEqual(
        machine.onTimer(
          environment(0, 105),
          state,
          TimeDomain.PROCESSING_TIME,
          Long.fromValue(105),
        ),
        FIRE_AND_FINISH,
      );
    });
  });

  describe("composite triggers", function () {
    it("fires afterAll once every subtrigger is ready", function () {
      const { results } = run(
        afterAll(afterCount(1), afterCount(2)),
        environment(0),
        2,
      );
      assert.deepStrictEqual(results, [CONTINUE, FIRE_AND_FINISH]);
    });

    it("fires afterFirst as soon as any subtrigger is ready", function () {
      const machine = new TriggerStateMachine(
        afterFirst(afterCount(3), afterProcessingTime(10)),
      );
      const state = machine.initialState();
      assert.strictEqual(
        machine.onElement(environment(0, 0), state, Long.fromValue(1)),
        CONTINUE,
      );
      assert.strictEqual(
        machine.onTimer(
          environment(0, 10),
          state,
          TimeDomain.PROCESSING_TIME,
          Long.fromValue(10),
        ),
        FIRE_AND_FINISH,
      );
    });

    it("cancels pending processing-time timers when re-armed", function () {
      const env = environment(0, 100);
      const { results, state } = run(
        repeatedly(afterFirst(afterCount(2), afterProcessingTime(10))),
        env,
        2,
      );
      assert.deepStrictEqual(results, [CONTINUE, FIRE]);
      assert.deepStrictEqual(env.timers, [[TimeDomain.PROCESSING_TIME, 110]]);
      assert.deepStrictEqual(env.deletedTimers, [
        [TimeDomain.PROCESSING_TIME, 110],
      ]);
      assert.strictEqual(state.children[0].children[1].timestamp, undefined);
    });

    it("runs afterEach subtriggers one after the other", function () {
      const { results } = run(
        afterEach(afterCount(1), afterCount(2)),
        environment(0),
        4,
      );
      assert.deepStrictEqual(results, [
        FIRE,
        CONTINUE,
        FIRE_AND_FINISH,
        CONTINUE,
      ]);
    });

    it("stops orFinally when the until trigger fires", function () {
      const { results } = run(
        orFinally(repeatedly(afterCount(1)), afterCount(3)),
        environment(0),
        4,
      );
      assert.deepStrictEqual(results, [FIRE, FIRE, FIRE_AND_FINISH, CONTINUE]);
    });

    it("evaluates registered custom triggers", function () {
      const { results } = run(
        repeatedly(customTrigger("test:every_second_element")),
        environment(0),
        4,
      );
      assert.deepStrictEqual(results, [CONTINUE, FIRE, CONTINUE, FIRE]);
    });
  });

  describe("merging", function () {
    it("sums counts of the merged windows", function () {
      const machine = new TriggerStateMachine(afterCount(3));
      const a = machine.initialState();
      const b = machine.initialState();
      machine.onElement(environment(0), a, Long.fromValue(1));
      machine.onElement(environment(0), b, Long.fromValue(2));

      const { state, result } = machine.onMerge(environment(0), [a, b]);
      assert.strictEqual(result, CONTINUE);
      assert.strictEqual(state.count, 2);
      assert.strictEqual(
        machine.onElement(environment(0), state, Long.fromValue(3)),
        FIRE_AND_FINISH,
      );
    });

    it("keeps the earliest processing time target and sets its timer again", function () {
      const machine = new TriggerStateMachine(afterProcessingTime(10));
      const a = machine.initialState();
      const b = machine.initialState();
      machine.onElement(environment(0, 5), a, Long.fromValue(1));
      machine.onElement(environment(0, 2), b, Long.fromValue(2));

      const env = environment(0, 6);
      const { state, result } = machine.onMerge(env, [a, b]);
      assert.strictEqual(result, CONTINUE);
      assert.strictEqual(state.timestamp?.toNumber(), 12);
      assert.deepStrictEqual(env.timers, [[TimeDomain.PROCESSING_TIME, 12]]);
    });

    it("honors the merged finishing policy", function () {
      const finished: TriggerState = {
        finished: true,
        count: 1,
        timestamp: undefined,
        children: [],
      };
      const open: TriggerState = {
        finished: false,
        count: 0,
        timestamp: undefined,
        children: [],
      };
      const any = new TriggerStateMachine(
        afterCount(5),
        MergedTriggerFinishing.ANY,
      ).onMerge(environment(0), [finished, open]);
      assert.strictEqual(any.state.finished, true);
      assert.strictEqual(any.state.count, 1);
      assert.strictEqual(any.result, CONTINUE);

      const all = new TriggerStateMachine(
        afterCount(5),
        MergedTriggerFinishing.ALL,
      ).onMerge(environment(0), [finished, open]);
      assert.strictEqual(all.state.finished, false);
      assert.strictEqual(all.state.count, 1);
      assert.strictEqual(all.result, CONTINUE);

      // An unfinished merge result is evaluated, and may fire at once.
      const firing = new TriggerStateMachine(
        afterCount(1),
        MergedTriggerFinishing.ALL,
      ).onMerge(environment(0), [finished, open]);
      assert.strictEqual(firing.result, FIRE_AND_FINISH);
      assert.strictEqual(firing.state.finished, true);
    });
  });

  it("encodes nested trigger state", function () {
    const state: TriggerState = {
      finished: false,
      count: 1,
      timestamp: undefined,
      children: [
        {
          finished: true,
          count: 0,
          timestamp: Long.fromValue(42),
          children: [],
        },
      ],
    };
    const decoded = decodeFromBytes(
      encodeToBytes(state, TriggerStateCoder.INSTANCE),
      TriggerStateCoder.INSTANCE,
    );
    assert.strictEqual(decoded.count, 1);
    assert.strictEqual(decoded.timestamp, undefined);
    assert.strictEqual(decoded.children.length, 1);
    assert.strictEqual(decoded.children[0].finished, true);
    assert.strictEqual(decoded.children[0].timestamp?.toNumber(), 42);
  });
});

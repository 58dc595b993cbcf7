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

import { Reader, Writer } from "protobufjs";

import { Coder, Context } from "../coders/coders";
import { InstantCoder } from "../coders/required_coders";
import { NullableCoder } from "../coders/standard_coders";
import {
  Trigger,
  TriggerFnContext,
  TriggerState,
  getTriggerFn,
  subtriggersOf,
} from "../transforms/triggers";
import { MergedTriggerFinishing } from "../transforms/windowing_strategy";
import { Instant, TimeDomain, Window } from "../values";

export enum TriggerResult {
  CONTINUE = "CONTINUE",
  FIRE = "FIRE",
  FIRE_AND_FINISH = "FIRE_AND_FINISH",
}

export function isFire(result: TriggerResult): boolean {
  return result !== TriggerResult.CONTINUE;
}

/** What a trigger can observe and do for the window it is evaluated in. */
export interface TriggerEnvironment {
  window: Window;
  inputWatermark: Instant;
  processingTime: Instant;
  setTimer(domain: TimeDomain, timestamp: Instant): void;
  deleteTimer(domain: TimeDomain, timestamp: Instant): void;
}

/**
 * Evaluates a trigger against its per-window state.
 *
 * Each event first updates the state of every node the event reaches. The
 * root then decides whether to fire; firing lets each node that took part
 * advance (a finished once-trigger, a re-armed `repeatedly`, the next child
 * of `afterEach`). The result is FIRE_AND_FINISH exactly when firing
 * finished the root.
 */
export class TriggerStateMachine {
  constructor(
    public readonly trigger: Trigger,
    private mergedFinishing: MergedTriggerFinishing = MergedTriggerFinishing.ANY,
  ) {}

  initialState(): TriggerState {
    return initialState(this.trigger);
  }

  onElement(
    env: TriggerEnvironment,
    state: TriggerState,
    timestamp: Instant,
  ): TriggerResult {
    elementArrived(this.trigger, state, env, timestamp);
    return this.evaluate(env, state);
  }

  /**
   * Combines the states of windows merging into `env.window` and evaluates
   * the result.
   */
  onMerge(
    env: TriggerEnvironment,
    mergingStates: TriggerState[],
  ): { state: TriggerState; result: TriggerResult } {
    const state =
      mergingStates.length === 0
        ? this.initialState()
        : mergeStates(this.trigger, mergingStates, this.mergedFinishing);
    windowsMerged(this.trigger, state, env);
    return { state, result: this.evaluate(env, state) };
  }

  onTimer(
    env: TriggerEnvironment,
    state: TriggerState,
    domain: TimeDomain,
    timestamp: Instant,
  ): TriggerResult {
    // Times are read from the environment; the timer only prompts a look.
    return this.evaluate(env, state);
  }

  private evaluate(
    env: TriggerEnvironment,
    state: TriggerState,
  ): TriggerResult {
    if (state.finished || !shouldFire(this.trigger, state, env)) {
      return TriggerResult.CONTINUE;
    }
    fired(this.trigger, state, env);
    return state.finished ? TriggerResult.FIRE_AND_FINISH : TriggerResult.FIRE;
  }
}

function initialState(trigger: Trigger): TriggerState {
  return {
    finished: false,
    count: 0,
    timestamp: undefined,
    children: subtriggersOf(trigger).map(initialState),
  };
}

// Starts the subtree over, cancelling the processing-time timers it was
// waiting for.
function reset(
  trigger: Trigger,
  state: TriggerState,
  env: TriggerEnvironment,
) {
  cancelTimers(trigger, state, env);
  const fresh = initialState(trigger);
  state.finished = fresh.finished;
  state.count = fresh.count;
  state.timestamp = fresh.timestamp;
  state.children = fresh.children;
}

function cancelTimers(
  trigger: Trigger,
  state: TriggerState,
  env: TriggerEnvironment,
) {
  if (
    trigger.kind === "afterProcessingTime" &&
    state.timestamp !== undefined
  ) {
    env.deleteTimer(TimeDomain.PROCESSING_TIME, state.timestamp);
  }
  subtriggersOf(trigger).forEach((t, i) =>
    cancelTimers(t, state.children[i], env),
  );
}

function pastEndOfWindow(env: TriggerEnvironment): boolean {
  return env.inputWatermark.gt(env.window.maxTimestamp());
}

function setEndOfWindowTimer(env: TriggerEnvironment) {
  if (!pastEndOfWindow(env)) {
    env.setTimer(TimeDomain.EVENT_TIME, env.window.maxTimestamp());
  }
}

// The first child of afterEach that has not finished.
function currentChild(state: TriggerState): number {
  return state.children.findIndex((child) => !child.finished);
}

function elementArrived(
  trigger: Trigger,
  state: TriggerState,
  env: TriggerEnvironment,
  timestamp: Instant,
) {
  if (state.finished) {
    return;
  }
  switch (trigger.kind) {
    case "default":
      setEndOfWindowTimer(env);
      break;
    case "never":
      break;
    case "afterWatermark":
      if (state.count === 0) {
        setEndOfWindowTimer(env);
        if (trigger.early) {
          elementArrived(trigger.early, state.children[0], env, timestamp);
        }
      } else if (trigger.late) {
        elementArrived(trigger.late, state.children[1], env, timestamp);
      }
      break;
    case "afterCount":
      state.count += 1;
      break;
    case "afterProcessingTime":
      if (state.timestamp === undefined) {
        state.timestamp = env.processingTime.add(trigger.delay);
        env.setTimer(TimeDomain.PROCESSING_TIME, state.timestamp);
      }
      break;
    case "repeatedly":
      elementArrived(trigger.subtrigger, state.children[0], env, timestamp);
      break;
    case "afterAll":
    case "afterFirst":
      trigger.subtriggers.forEach((t, i) =>
        elementArrived(t, state.children[i], env, timestamp),
      );
      break;
    case "afterEach": {
      const i = currentChild(state);
      if (i >= 0) {
        elementArrived(
          trigger.subtriggers[i],
          state.children[i],
          env,
          timestamp,
        );
      }
      break;
    }
    case "orFinally":
      elementArrived(trigger.main, state.children[0], env, timestamp);
      elementArrived(trigger.until, state.children[1], env, timestamp);
      break;
    case "custom":
      trigger.subtriggers.forEach((t, i) =>
        elementArrived(t, state.children[i], env, timestamp),
      );
      getTriggerFn(trigger.urn).onElement(
        customContext(trigger, state, env),
        timestamp,
      );
      break;
  }
}

function shouldFire(
  trigger: Trigger,
  state: TriggerState,
  env: TriggerEnvironment,
): boolean {
  if (state.finished) {
    return false;
  }
  switch (trigger.kind) {
    case "default":
      return pastEndOfWindow(env);
    case "never":
      return false;
    case "afterWatermark":
      if (state.count === 0) {
        return (
          pastEndOfWindow(env) ||
          (trigger.early !== undefined &&
            shouldFire(trigger.early, state.children[0], env))
        );
      }
      return (
        trigger.late !== undefined &&
        shouldFire(trigger.late, state.children[1], env)
      );
    case "afterCount":
      return state.count >= trigger.count;
    case "afterProcessingTime":
      return (
        state.timestamp !== undefined &&
        env.processingTime.gte(state.timestamp)
      );
    case "repeatedly":
      return shouldFire(trigger.subtrigger, state.children[0], env);
    case "afterFirst":
      return trigger.subtriggers.some((t, i) =>
        shouldFire(t, state.children[i], env),
      );
    case "afterAll":
      return trigger.subtriggers.every(
        (t, i) =>
          state.children[i].finished || shouldFire(t, state.children[i], env),
      );
    case "afterEach": {
      const i = currentChild(state);
      return (
        i >= 0 && shouldFire(trigger.subtriggers[i], state.children[i], env)
      );
    }
    case "orFinally":
      return (
        shouldFire(trigger.main, state.children[0], env) ||
        shouldFire(trigger.until, state.children[1], env)
      );
    case "custom":
      return getTriggerFn(trigger.urn).shouldFire(
        customContext(trigger, state, env),
      );
  }
}

function fired(
  trigger: Trigger,
  state: TriggerState,
  env: TriggerEnvironment,
) {
  switch (trigger.kind) {
    case "default":
    case "never":
      break;
    case "afterWatermark":
      if (state.count === 0) {
        if (pastEndOfWindow(env)) {
          // The on-time pane; early firings stop here.
          state.count = 1;
          if (trigger.early) {
            reset(trigger.early, state.children[0], env);
          }
          if (trigger.late === undefined) {
            state.finished = true;
          }
        } else if (trigger.early) {
          firedAndRearmed(trigger.early, state.children[0], env);
        }
      } else if (trigger.late) {
        firedAndRearmed(trigger.late, state.children[1], env);
      }
      break;
    case "afterCount":
    case "afterProcessingTime":
      state.finished = true;
      break;
    case "repeatedly":
      firedAndRearmed(trigger.subtrigger, state.children[0], env);
      break;
    case "afterFirst": {
      const firing = trigger.subtriggers
        .map((t, i) => ({ t, i }))
        .filter(({ t, i }) => shouldFire(t, state.children[i], env));
      firing.forEach(({ t, i }) => fired(t, state.children[i], env));
      state.finished = true;
      break;
    }
    case "afterAll":
      trigger.subtriggers.forEach((t, i) => {
        if (!state.children[i].finished) {
          fired(t, state.children[i], env);
        }
      });
      state.finished = true;
      break;
    case "afterEach": {
      const i = currentChild(state);
      fired(trigger.subtriggers[i], state.children[i], env);
      state.finished = currentChild(state) < 0;
      break;
    }
    case "orFinally":
      if (shouldFire(trigger.until, state.children[1], env)) {
        fired(trigger.until, state.children[1], env);
        state.finished = true;
      } else {
        fired(trigger.main, state.children[0], env);
        state.finished = state.children[0].finished;
      }
      break;
    case "custom":
      getTriggerFn(trigger.urn).onFire(customContext(trigger, state, env));
      break;
  }
}

function firedAndRearmed(
  trigger: Trigger,
  state: TriggerState,
  env: TriggerEnvironment,
) {
  fired(trigger, state, env);
  if (state.finished) {
    reset(trigger, state, env);
  }
}

function mergeStates(
  trigger: Trigger,
  states: TriggerState[],
  finishing: MergedTriggerFinishing,
): TriggerState {
  let timestamp: Instant | undefined = undefined;
  for (const state of states) {
    if (
      state.timestamp !== undefined &&
      (timestamp === undefined || state.timestamp.lt(timestamp))
    ) {
      timestamp = state.timestamp;
    }
  }
  return {
    finished:
      finishing === MergedTriggerFinishing.ANY
        ? states.some((s) => s.finished)
        : states.every((s) => s.finished),
    count: states.reduce((total, s) => total + s.count, 0),
    timestamp,
    children: subtriggersOf(trigger).map((t, i) =>
      mergeStates(
        t,
        states.map((s) => s.children[i]),
        finishing,
      ),
    ),
  };
}

// Timers belong to windows, so a merged window re-registers what its
// unfinished nodes are waiting for.
function windowsMerged(
  trigger: Trigger,
  state: TriggerState,
  env: TriggerEnvironment,
) {
  if (state.finished) {
    return;
  }
  switch (trigger.kind) {
    case "default":
      setEndOfWindowTimer(env);
      break;
    case "afterWatermark":
      if (state.count === 0) {
        setEndOfWindowTimer(env);
      }
      break;
    case "afterProcessingTime":
      if (state.timestamp !== undefined) {
        env.setTimer(TimeDomain.PROCESSING_TIME, state.timestamp);
      }
      break;
  }
  subtriggersOf(trigger).forEach((t, i) =>
    windowsMerged(t, state.children[i], env),
  );
  if (trigger.kind === "custom") {
    getTriggerFn(trigger.urn).onMerge(customContext(trigger, state, env));
  }
}

function customContext(
  trigger: Extract<Trigger, { kind: "custom" }>,
  state: TriggerState,
  env: TriggerEnvironment,
): TriggerFnContext {
  return {
    payload: trigger.payload,
    window: env.window,
    inputWatermark: env.inputWatermark,
    processingTime: env.processingTime,
    state,
    subtriggers: trigger.subtriggers.map((t, i) => ({
      isFinished: () => state.children[i].finished,
      shouldFire: () => shouldFire(t, state.children[i], env),
      onFire: () => fired(t, state.children[i], env),
      reset: () => reset(t, state.children[i], env),
    })),
    setTimer: (domain, timestamp) => env.setTimer(domain, timestamp),
  };
}

const optionalInstantCoder = new NullableCoder(InstantCoder.INSTANCE);

export class TriggerStateCoder implements Coder<TriggerState> {
  static INSTANCE = new TriggerStateCoder();

  encode(state: TriggerState, writer: Writer, context: Context) {
    writer.bool(state.finished);
    writer.int32(state.count);
    optionalInstantCoder.encode(
      state.timestamp,
      writer,
      Context.needsDelimiters,
    );
    writer.int32(state.children.length);
    for (const child of state.children) {
      this.encode(child, writer, Context.needsDelimiters);
    }
  }

  decode(reader: Reader, context: Context): TriggerState {
    const finished = reader.bool();
    const count = reader.int32();
    const timestamp = optionalInstantCoder.decode(
      reader,
      Context.needsDelimiters,
    );
    const numChildren = reader.int32();
    const children: TriggerState[] = [];
    for (let i = 0; i < numChildren; i++) {
      children.push(this.decode(reader, Context.needsDelimiters));
    }
    return { finished, count, timestamp, children };
  }
}

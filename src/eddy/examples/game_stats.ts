#!/usr/bin/env node
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

// Run directly with
//
//    node dist/src/eddy/examples/game_stats.js
//
// Options choose the generated data and the window sizes, e.g.
//
//    node dist/src/eddy/examples/game_stats.js --users=50 --sessionGapMinutes=10

import Long from "long";
import yargs from "yargs";

import { Coder } from "../coders/coders";
import { GeneralObjectCoder } from "../coders/js_coders";
import {
  DoubleCoder,
  StrUtf8Coder,
  VarIntCoder,
} from "../coders/standard_coders";
import { TimestampedElement, directRunner } from "../runners/direct_runner";
import { mean, sum } from "../transforms/combiners";
import { CombineFn } from "../transforms/group_and_combine";
import { afterCount, afterWatermark } from "../transforms/triggers";
import {
  AccumulationMode,
  ClosingBehavior,
  OutputTime,
  WindowingStrategy,
  windowingStrategy,
} from "../transforms/windowing_strategy";
import { fixedWindows, sessions } from "../transforms/windowings";
import {
  IntervalWindow,
  KV,
  MAX_TIMESTAMP,
  Timing,
  Window,
  WindowedValue,
  minutes,
} from "../values";
import {
  GroupAlsoByWindowOptions,
  GroupAlsoByWindowReducer,
} from "../worker/group_also_by_window";
import { CombiningAccumulator } from "../worker/pane_accumulator";
import { InMemorySideInputs, SideInputView } from "../worker/side_inputs";

export interface GameEvent {
  user: string;
  team: string;
  score: number;
  /** Milliseconds since the epoch. */
  timestamp: number;
}

interface UserScore {
  user: string;
  score: number;
}

export interface GameStatsOptions {
  fixedWindowMinutes: number;
  sessionGapMinutes: number;
  userActivityWindowMinutes: number;
  /** Elements between early firings of the team scores. */
  earlyFiringCount: number;
}

export interface GameStatsReport {
  spammers: { window: string; users: string[] }[];
  teamScores: {
    team: string;
    window: string;
    score: number;
    timing: Timing;
  }[];
  meanSessionMinutes: { window: string; minutes: number }[];
}

// Users scoring more than this multiple of the mean are considered spammers.
const SCORE_WEIGHT = 2.5;

/**
 * Computes per-window team scores with spammers filtered out, and the mean
 * length of user sessions.
 */
export async function gameStats(
  events: GameEvent[],
  options: GameStatsOptions,
): Promise<GameStatsReport> {
  const fixed = fixedWindows(minutes(options.fixedWindowMinutes));

  // Spammers are users whose total score within a fixed window is far above
  // the mean total of that window.
  const userSums = await groupAndCombine(
    windowingStrategy(fixed),
    sum,
    VarIntCoder.INSTANCE,
    events.map((e) => element(e.user, e.score, e.timestamp)),
  );
  const meanUserSums = await groupAndCombine(
    windowingStrategy(fixed),
    mean,
    VarIntCoder.INSTANCE,
    userSums.map((pane) =>
      element("all", pane.value.value, pane.timestamp.toNumber()),
    ),
  );
  const meanByWindow = new Map(
    meanUserSums.map((pane): [string, number] => [
      windowOf(pane).toString(),
      pane.value.value,
    ]),
  );
  const spammersByWindow = new Map<
    string,
    { window: IntervalWindow; users: string[] }
  >();
  for (const pane of userSums) {
    const window = windowOf(pane);
    const meanScore = meanByWindow.get(window.toString()) ?? 0;
    if (pane.value.value > meanScore * SCORE_WEIGHT) {
      console.info(
        `User ${pane.value.key} spammer score ${pane.value.value} with mean ${meanScore} in ${window.toString()}`,
      );
      const entry = spammersByWindow.get(window.toString()) ?? {
        window,
        users: [],
      };
      entry.users.push(pane.value.key);
      spammersByWindow.set(window.toString(), entry);
    }
  }
  const spammersView: SideInputView<string[], IntervalWindow> = {
    tag: "spammers",
    windowFn: fixed,
    coder: new GeneralObjectCoder<string[]>(),
  };
  const sideInputs = new InMemorySideInputs();
  for (const { window, users } of spammersByWindow.values()) {
    sideInputs.publish(spammersView, window, users.sort());
  }

  const teamScores = await groupAndCombine(
    windowingStrategy(fixed, {
      trigger: afterWatermark({ early: afterCount(options.earlyFiringCount) }),
      accumulationMode: AccumulationMode.ACCUMULATING,
      closingBehavior: ClosingBehavior.FIRE_ALWAYS,
    }),
    sumOfScores,
    new GeneralObjectCoder<UserScore>(),
    events.map((e) =>
      element(e.team, { user: e.user, score: e.score }, e.timestamp),
    ),
    {
      elementFilter: (element, window, context) =>
        !(context.sideInputs.get(spammersView, window) ?? []).includes(
          element.value.user,
        ),
    },
    sideInputs,
  );

  // Session lengths, averaged over the sessions ending in each window.
  const userSessions = await groupAndCombine(
    windowingStrategy(sessions(minutes(options.sessionGapMinutes)), {
      outputTime: OutputTime.END_OF_WINDOW,
    }),
    sum,
    VarIntCoder.INSTANCE,
    events.map((e) => element(e.user, e.score, e.timestamp)),
  );
  const meanSessions = await groupAndCombine(
    windowingStrategy(
      fixedWindows(minutes(options.userActivityWindowMinutes)),
      { accumulationMode: AccumulationMode.ACCUMULATING },
    ),
    mean,
    DoubleCoder.INSTANCE,
    userSessions.map((pane) => {
      const window = windowOf(pane);
      const lengthMinutes =
        window.end.sub(window.start).toNumber() / minutes(1).toNumber();
      return element("all", lengthMinutes, pane.timestamp.toNumber());
    }),
  );

  return {
    spammers: [...spammersByWindow.values()]
      .sort((a, b) => a.window.compareTo(b.window))
      .map(({ window, users }) => ({ window: window.toString(), users })),
    teamScores: teamScores
      .filter((pane) => pane.pane.isLast)
      .sort(byWindowThenKey)
      .map((pane) => ({
        team: pane.value.key,
        window: windowOf(pane).toString(),
        score: pane.value.value,
        timing: pane.pane.timing,
      })),
    meanSessionMinutes: meanSessions
      .filter((pane) => pane.pane.isLast)
      .sort(byWindowThenKey)
      .map((pane) => ({
        window: windowOf(pane).toString(),
        minutes: pane.value.value,
      })),
  };
}

const sumOfScores: CombineFn<UserScore, number, number> = {
  createAccumulator: () => 0,
  addInput: (acc, input) => acc + input.score,
  mergeAccumulators: (accumulators) =>
    [...accumulators].reduce((a, b) => a + b, 0),
  extractOutput: (acc) => acc,
  accumulatorCoder: () => VarIntCoder.INSTANCE,
};

function element<V>(
  key: string,
  value: V,
  timestamp: number,
): TimestampedElement<string, V> {
  return { key, value, timestamp: Long.fromValue(timestamp) };
}

async function groupAndCombine<V, A, O, W extends Window>(
  strategy: WindowingStrategy<W>,
  combineFn: CombineFn<V, A, O>,
  valueCoder: Coder<V>,
  elements: TimestampedElement<string, V>[],
  options: GroupAlsoByWindowOptions<string, V> = {},
  sideInputs: InMemorySideInputs = new InMemorySideInputs(),
): Promise<WindowedValue<KV<string, O>>[]> {
  const runner = directRunner(
    new GroupAlsoByWindowReducer(
      strategy,
      new CombiningAccumulator(combineFn, valueCoder),
      options,
    ),
    { keyCoder: StrUtf8Coder.INSTANCE, valueCoder, sideInputs },
  );
  const result = await runner.run([
    ...elements.map((e) => ({ type: "element" as const, ...e })),
    { type: "watermark", watermark: MAX_TIMESTAMP },
  ]);
  return result.panes;
}

function windowOf<T>(pane: WindowedValue<T>): IntervalWindow {
  const window = pane.windows[0];
  if (!(window instanceof IntervalWindow)) {
    throw new Error("Expected an interval window, got " + window);
  }
  return window;
}

function byWindowThenKey<T>(
  a: WindowedValue<KV<string, T>>,
  b: WindowedValue<KV<string, T>>,
): number {
  const byWindow = windowOf(a).compareTo(windowOf(b));
  return byWindow !== 0 ? byWindow : a.value.key.localeCompare(b.value.key);
}

export interface GeneratorOptions {
  users: number;
  teams: number;
  eventsPerUser: number;
  durationMinutes: number;
  seed: number;
}

/**
 * Deterministic game events: regular users play in bursts with modest scores,
 * and the first user of every team but the last scores like a bot.
 */
export function generateEvents(options: GeneratorOptions): GameEvent[] {
  // Park-Miller; the state must stay within [1, 2^31 - 2].
  let seed = (Math.abs(options.seed) % 2147483646) + 1;
  const random = () => {
    seed = (seed * 16807) % 2147483647;
    return (seed - 1) / 2147483646;
  };
  const events: GameEvent[] = [];
  const span = minutes(options.durationMinutes).toNumber();
  for (let u = 0; u < options.users; u++) {
    const team = u % options.teams;
    const isBot = u < options.teams - 1;
    let timestamp = Math.floor(random() * span);
    for (let i = 0; i < options.eventsPerUser; i++) {
      events.push({
        user: `user${u}`,
        team: `team${team}`,
        score: isBot
          ? 50 + Math.floor(random() * 50)
          : Math.floor(random() * 10),
        timestamp: timestamp % span,
      });
      timestamp += Math.floor(random() * minutes(3).toNumber());
    }
  }
  return events;
}

async function main() {
  const argv = yargs(process.argv.slice(2))
    .options({
      users: { type: "number", default: 20 },
      teams: { type: "number", default: 4 },
      eventsPerUser: { type: "number", default: 30 },
      durationMinutes: { type: "number", default: 180 },
      seed: { type: "number", default: 42 },
      fixedWindowMinutes: { type: "number", default: 60 },
      sessionGapMinutes: { type: "number", default: 5 },
      userActivityWindowMinutes: { type: "number", default: 30 },
      earlyFiringCount: { type: "number", default: 50 },
    })
    .strict()
    .parseSync();

  const report = await gameStats(generateEvents(argv), argv);
  for (const { window, users } of report.spammers) {
    console.log(`spammers ${window}: ${users.join(", ")}`);
  }
  for (const { team, window, score, timing } of report.teamScores) {
    console.log(`team ${team} ${window}: ${score} (${timing})`);
  }
  for (const { window, minutes } of report.meanSessionMinutes) {
    console.log(`mean session ${window}: ${minutes.toFixed(2)} minutes`);
  }
}

if (require.main === module) {
  main()
    .catch((e) => console.error(e))
    .finally(() => process.exit());
}

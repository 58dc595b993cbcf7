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

import {
  GameEvent,
  gameStats,
  generateEvents,
} from "../src/eddy/examples/game_stats";
import { Timing } from "../src/eddy/values";

const minute = 60 * 1000;

function play(
  user: string,
  team: string,
  score: number,
  atMinute: number,
): GameEvent {
  return { user, team, score, timestamp: atMinute * minute };
}

describe("game stats example", function () {
  it("filters spammers from team scores and averages sessions", async function () {
    const report = await gameStats(
      [
        play("alice", "red", 5, 1),
        play("alice", "red", 3, 4),
        play("bob", "red", 4, 2),
        play("carol", "blue", 6, 30),
        play("dave", "blue", 200, 10),
      ],
      {
        fixedWindowMinutes: 60,
        sessionGapMinutes: 5,
        userActivityWindowMinutes: 30,
        earlyFiringCount: 2,
      },
    );

    assert.deepStrictEqual(report.spammers, [
      { window: "[0, 3600000)", users: ["dave"] },
    ]);
    assert.deepStrictEqual(report.teamScores, [
      { team: "blue", window: "[0, 3600000)", score: 6, timing: Timing.ON_TIME },
      { team: "red", window: "[0, 3600000)", score: 12, timing: Timing.ON_TIME },
    ]);
    assert.deepStrictEqual(report.meanSessionMinutes, [
      { window: "[0, 1800000)", minutes: 6 },
      { window: "[1800000, 3600000)", minutes: 5 },
    ]);
  });

  it("generates the same events for the same seed", function () {
    const options = {
      users: 4,
      teams: 2,
      eventsPerUser: 5,
      durationMinutes: 60,
      seed: 7,
    };
    const events = generateEvents(options);
    assert.deepStrictEqual(generateEvents(options), events);
    assert.strictEqual(events.length, 20);
    for (const event of events) {
      assert.ok(event.timestamp >= 0 && event.timestamp < 60 * minute);
      if (event.user === "user0") {
        assert.ok(event.score >= 50);
      } else {
        assert.ok(event.score < 10);
      }
    }
    assert.deepStrictEqual(
      [...new Set(events.map((e) => `${e.user}/${e.team}`))],
      ["user0/team0", "user1/team1", "user2/team0", "user3/team1"],
    );
  });
});

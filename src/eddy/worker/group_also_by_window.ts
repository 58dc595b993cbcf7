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

import {
  DROPPED_DUE_TO_CLOSED_WINDOW,
  DROPPED_DUE_TO_LATENESS,
  ELEMENTS_PROCESSED,
  PANES_EMITTED,
  PANE_SIZE,
  STALE_TIMERS,
} from "../internal/urns";
import { MergeResult } from "../transforms/window";
import {
  AccumulationMode,
  ClosingBehavior,
  WindowingStrategy,
  garbageCollectionTime,
} from "../transforms/windowing_strategy";
import { TriggerState } from "../transforms/triggers";
import {
  Instant,
  KV,
  TimeDomain,
  Window,
  WindowedValue,
} from "../values";
import { stageLogPrefix } from "./logging";
import { MetricsContainer } from "./metrics";
import { PaneAccumulator } from "./pane_accumulator";
import {
  PaneStats,
  PaneStatsCoder,
  clearPendingElements,
  emptyPaneStats,
  mergePaneStats,
  nextPaneInfo,
  outputTimestamp,
  paneEmitted,
  recordElement,
  watermarkHold,
} from "./panes";
import { SideInputReader } from "./side_inputs";
import { WorkItemState } from "./state";
import { TimerData, WorkItemTimers } from "./timers";
import {
  TriggerEnvironment,
  TriggerResult,
  TriggerStateCoder,
  TriggerStateMachine,
  isFire,
} from "./trigger_state_machine";
import { WorkItemHolds } from "./watermarks";
import { ActiveWindowSet } from "./window_set";

/** Everything the reducer reads and writes while processing one work item. */
export interface ReducerContext<K, O> {
  key: K;
  state: WorkItemState;
  timers: WorkItemTimers;
  holds: WorkItemHolds;
  metrics: MetricsContainer;
  sideInputs: SideInputReader;
  inputWatermark: Instant;
  processingTime: Instant;
  output(value: WindowedValue<KV<K, O>>): void;
}

export interface ElementFilterContext {
  sideInputs: SideInputReader;
}

export type ElementFilter<K, V> = (
  element: KV<K, V>,
  window: Window,
  context: ElementFilterContext,
) => boolean;

export interface GroupAlsoByWindowOptions<K, V> {
  /**
   * Decides, for every window an element is assigned to, whether the element
   * is grouped there. Side inputs are read for that window.
   */
  elementFilter?: ElementFilter<K, V>;
}

/**
 * Groups the values of one key by window, emitting a pane whenever the
 * window's trigger fires.
 *
 * Elements are assigned to windows, merged into the active windows of the key
 * for merging window functions, and added to the window's pane. Timers drive
 * watermark and processing-time triggers and, at the window's garbage
 * collection time, emit any remaining data and drop all of the window's
 * state.
 */
export class GroupAlsoByWindowReducer<K, V, O, W extends Window = Window> {
  private triggerMachine: TriggerStateMachine;

  constructor(
    public readonly strategy: WindowingStrategy<W>,
    private accumulator: PaneAccumulator<V, O>,
    private options: GroupAlsoByWindowOptions<K, V> = {},
  ) {
    this.triggerMachine = new TriggerStateMachine(
      strategy.trigger,
      strategy.mergedTriggerFinishing,
    );
  }

  async processElement(
    context: ReducerContext<K, O>,
    value: V,
    timestamp: Instant,
  ): Promise<void> {
    context.metrics.counter(ELEMENTS_PROCESSED).update(1);
    const windows = await ActiveWindowSet.load(
      context.state,
      this.strategy.windowFn,
    );
    for (const window of this.strategy.windowFn.assignWindows(timestamp)) {
      await this.processElementInWindow(
        context,
        windows,
        window,
        value,
        timestamp,
      );
    }
    windows.persist();
  }

  async processTimer(
    context: ReducerContext<K, O>,
    timer: TimerData,
  ): Promise<void> {
    const windows = await ActiveWindowSet.load(
      context.state,
      this.strategy.windowFn,
    );
    const windowId = timer.windowId;
    const window = windows.decodeWindowId(windowId);
    const isGarbageCollection =
      timer.domain === TimeDomain.EVENT_TIME &&
      timer.timestamp.gte(this.gcTime(window));

    if (windows.isFinished(window) && isGarbageCollection) {
      windows.remove(window);
      context.timers.deleteWindowTimers(windowId);
    } else if (!windows.isActive(window)) {
      context.metrics.counter(STALE_TIMERS).update(1);
      console.debug(
        `${stageLogPrefix()}Ignoring timer at ${timer.timestamp.toString()} for inactive window ${window.toString()}`,
      );
    } else {
      const triggerState = await this.readTriggerState(context, windowId);
      const result = this.triggerMachine.onTimer(
        this.triggerEnvironment(context, window, windowId),
        triggerState,
        timer.domain,
        timer.timestamp,
      );
      this.writeTriggerState(context, windowId, triggerState);
      if (isGarbageCollection) {
        await this.emitPane(context, window, windowId, true);
        this.purgeWindow(context, windows, window, windowId);
      } else if (isFire(result)) {
        await this.onTrigger(context, windows, window, result);
      }
    }
    windows.persist();
  }

  private async processElementInWindow(
    context: ReducerContext<K, O>,
    windows: ActiveWindowSet<W>,
    assigned: W,
    value: V,
    timestamp: Instant,
  ) {
    if (context.inputWatermark.gt(this.gcTime(assigned))) {
      context.metrics.counter(DROPPED_DUE_TO_LATENESS).update(1);
      console.debug(
        `${stageLogPrefix()}Dropping element at ${timestamp.toString()} for expired window ${assigned.toString()}`,
      );
      return;
    }
    if (windows.isFinished(assigned)) {
      context.metrics.counter(DROPPED_DUE_TO_CLOSED_WINDOW).update(1);
      console.debug(
        `${stageLogPrefix()}Dropping element at ${timestamp.toString()} for closed window ${assigned.toString()}`,
      );
      return;
    }
    const elementFilter = this.options.elementFilter;
    if (
      elementFilter !== undefined &&
      !elementFilter({ key: context.key, value }, assigned, {
        sideInputs: context.sideInputs,
      })
    ) {
      return;
    }

    const { merges, window } = windows.mergeWith(assigned);
    let mergeResult = TriggerResult.CONTINUE;
    for (const merge of merges) {
      const result = await this.mergeWindows(context, windows, merge);
      if (merge.mergeResult.equals(window)) {
        mergeResult = result;
      } else if (isFire(result)) {
        await this.onTrigger(context, windows, merge.mergeResult, result);
      }
    }

    const windowId = windows.windowId(window);
    await this.accumulator.add(context.state, windowId, value);
    const stats = await this.readStats(context, windowId);
    recordElement(stats, timestamp, timestamp.lt(context.inputWatermark));
    this.writeStats(context, windowId, stats);
    this.updateHold(context, window, windowId, stats);
    context.timers.setTimer(
      windowId,
      TimeDomain.EVENT_TIME,
      this.gcTime(window),
    );

    let result = mergeResult;
    // A merge that finished the trigger still delivers this element, in the
    // window's final pane.
    if (mergeResult !== TriggerResult.FIRE_AND_FINISH) {
      const triggerState = await this.readTriggerState(context, windowId);
      const elementResult = this.triggerMachine.onElement(
        this.triggerEnvironment(context, window, windowId),
        triggerState,
        timestamp,
      );
      this.writeTriggerState(context, windowId, triggerState);
      result = combineResults(mergeResult, elementResult);
    }
    if (isFire(result)) {
      await this.onTrigger(context, windows, window, result);
    }
  }

  /**
   * Moves the state of every merged window into the merge result and
   * returns what the trigger decides for it.
   */
  private async mergeWindows(
    context: ReducerContext<K, O>,
    windows: ActiveWindowSet<W>,
    merge: MergeResult<W>,
  ): Promise<TriggerResult> {
    const targetId = windows.windowId(merge.mergeResult);
    const sourceIds = merge.toBeMerged.map((w) => windows.windowId(w));
    await this.accumulator.merge(context.state, sourceIds, targetId);

    const allStats: PaneStats[] = [];
    const triggerStates: TriggerState[] = [];
    for (const sourceId of sourceIds) {
      const stats = await context.state.readValue(
        statsTag(sourceId),
        PaneStatsCoder.INSTANCE,
      );
      if (stats !== undefined) {
        allStats.push(stats);
      }
      const triggerState = await context.state.readValue(
        triggerTag(sourceId),
        TriggerStateCoder.INSTANCE,
      );
      if (triggerState !== undefined) {
        triggerStates.push(triggerState);
      }
      context.state.delete(statsTag(sourceId));
      context.state.delete(triggerTag(sourceId));
      context.holds.setHold(holdId(context, sourceId), undefined);
      if (sourceId !== targetId) {
        context.timers.deleteWindowTimers(sourceId);
      }
    }

    const stats = mergePaneStats(allStats);
    this.writeStats(context, targetId, stats);
    this.updateHold(context, merge.mergeResult, targetId, stats);
    context.timers.setTimer(
      targetId,
      TimeDomain.EVENT_TIME,
      this.gcTime(merge.mergeResult),
    );
    const { state, result } = this.triggerMachine.onMerge(
      this.triggerEnvironment(context, merge.mergeResult, targetId),
      triggerStates,
    );
    this.writeTriggerState(context, targetId, state);
    return result;
  }

  private async onTrigger(
    context: ReducerContext<K, O>,
    windows: ActiveWindowSet<W>,
    window: W,
    result: TriggerResult,
  ) {
    const windowId = windows.windowId(window);
    const finish = result === TriggerResult.FIRE_AND_FINISH;
    await this.emitPane(context, window, windowId, finish);
    if (finish) {
      this.finishWindow(context, windows, window, windowId);
    }
  }

  /**
   * Emits the window's pending data as a pane. Nothing is emitted without
   * new data, except for the last pane of a window that already emitted one
   * under FIRE_ALWAYS.
   */
  private async emitPane(
    context: ReducerContext<K, O>,
    window: W,
    windowId: string,
    isLast: boolean,
  ) {
    const stats = await this.readStats(context, windowId);
    const emit =
      stats.elementCount > 0 ||
      (isLast &&
        this.strategy.closingBehavior === ClosingBehavior.FIRE_ALWAYS &&
        stats.paneIndex > 0);
    if (emit) {
      const pane = nextPaneInfo(stats, window, context.inputWatermark, isLast);
      context.output({
        value: {
          key: context.key,
          value: await this.accumulator.extract(context.state, windowId),
        },
        windows: [window],
        pane,
        timestamp: outputTimestamp(stats, window, this.strategy.outputTime),
      });
      context.metrics.counter(PANES_EMITTED).update(1);
      context.metrics.distribution(PANE_SIZE).update(stats.elementCount);
      paneEmitted(stats, pane);
    } else {
      clearPendingElements(stats);
    }
    if (this.strategy.accumulationMode === AccumulationMode.DISCARDING) {
      this.accumulator.clear(context.state, windowId);
    }
    this.writeStats(context, windowId, stats);
    context.holds.setHold(holdId(context, windowId), undefined);
  }

  /**
   * Drops the state of a window whose trigger finished, remembering it as
   * finished until garbage collection.
   */
  private finishWindow(
    context: ReducerContext<K, O>,
    windows: ActiveWindowSet<W>,
    window: W,
    windowId: string,
  ) {
    this.clearWindowState(context, windowId);
    windows.finish(window);
    context.timers.setTimer(
      windowId,
      TimeDomain.EVENT_TIME,
      this.gcTime(window),
    );
  }

  private purgeWindow(
    context: ReducerContext<K, O>,
    windows: ActiveWindowSet<W>,
    window: W,
    windowId: string,
  ) {
    this.clearWindowState(context, windowId);
    windows.remove(window);
  }

  private clearWindowState(context: ReducerContext<K, O>, windowId: string) {
    this.accumulator.clear(context.state, windowId);
    context.state.delete(statsTag(windowId));
    context.state.delete(triggerTag(windowId));
    context.timers.deleteWindowTimers(windowId);
    context.holds.setHold(holdId(context, windowId), undefined);
  }

  private gcTime(window: W): Instant {
    return garbageCollectionTime(window, this.strategy.allowedLateness);
  }

  private updateHold(
    context: ReducerContext<K, O>,
    window: W,
    windowId: string,
    stats: PaneStats,
  ) {
    context.holds.setHold(
      holdId(context, windowId),
      watermarkHold(
        stats,
        window,
        this.strategy.outputTime,
        this.gcTime(window),
      ),
    );
  }

  private triggerEnvironment(
    context: ReducerContext<K, O>,
    window: W,
    windowId: string,
  ): TriggerEnvironment {
    return {
      window,
      inputWatermark: context.inputWatermark,
      processingTime: context.processingTime,
      setTimer: (domain, timestamp) =>
        context.timers.setTimer(windowId, domain, timestamp),
      deleteTimer: (domain, timestamp) =>
        context.timers.deleteTimer(windowId, domain, timestamp),
    };
  }

  private async readStats(
    context: ReducerContext<K, O>,
    windowId: string,
  ): Promise<PaneStats> {
    return (
      (await context.state.readValue(
        statsTag(windowId),
        PaneStatsCoder.INSTANCE,
      )) ?? emptyPaneStats()
    );
  }

  private writeStats(
    context: ReducerContext<K, O>,
    windowId: string,
    stats: PaneStats,
  ) {
    context.state.writeValue(statsTag(windowId), PaneStatsCoder.INSTANCE, stats);
  }

  private async readTriggerState(
    context: ReducerContext<K, O>,
    windowId: string,
  ): Promise<TriggerState> {
    return (
      (await context.state.readValue(
        triggerTag(windowId),
        TriggerStateCoder.INSTANCE,
      )) ?? this.triggerMachine.initialState()
    );
  }

  private writeTriggerState(
    context: ReducerContext<K, O>,
    windowId: string,
    state: TriggerState,
  ) {
    context.state.writeValue(
      triggerTag(windowId),
      TriggerStateCoder.INSTANCE,
      state,
    );
  }
}

function combineResults(a: TriggerResult, b: TriggerResult): TriggerResult {
  if (
    a === TriggerResult.FIRE_AND_FINISH ||
    b === TriggerResult.FIRE_AND_FINISH
  ) {
    return TriggerResult.FIRE_AND_FINISH;
  }
  return isFire(a) || isFire(b) ? TriggerResult.FIRE : TriggerResult.CONTINUE;
}

/** The id of a window's watermark hold, unique across keys. */
export function holdId<K, O>(
  context: ReducerContext<K, O>,
  windowId: string,
): string {
  return context.state.key + "/" + windowId;
}

function statsTag(windowId: string) {
  return windowId + "/pane";
}

function triggerTag(windowId: string) {
  return windowId + "/trigger";
}

// Copyright (C) 2025 The Android Open Source Project
//
// Licensed under the Apache License, Version 2.0 (the "License");
// you may not use this file except in compliance with the License.
// You may obtain a copy of the License at
//
//      http://www.apache.org/licenses/LICENSE-2.0
//
// Unless required by applicable law or agreed to in writing, software
// distributed under the License is distributed on an "AS IS" BASIS,
// WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
// See the License for the specific language governing permissions and
// limitations under the License.

import {Fps} from '../base/fps';
import {Duration, duration, Time, time} from '../base/time';
import {LayerVote, LayerVoteType, Seamlessness} from './types';

// Maximum time between presents for a layer to be considered active.
export const MAX_ACTIVE_LAYER_PERIOD: duration = Duration.fromMillis(1200);

// Earliest present time for a layer to be considered active.
export function getActiveLayerThreshold(now: time): time {
  return Time.sub(now, MAX_ACTIVE_LAYER_PERIOD);
}

// A layer is frequent if the earliest of its last few updates is recent
// enough. Infrequent layers vote for a low rate whatever their average.
const FREQUENT_LAYER_WINDOW_SIZE = 3;
const MIN_FPS_FOR_FREQUENT_LAYER = Fps.fromValue(10);
const MAX_PERIOD_FOR_FREQUENT_LAYER: duration =
  MIN_FPS_FOR_FREQUENT_LAYER.period + Duration.fromMillis(1);

// Frames closer than this are duplicates; frames further apart than that
// don't count towards the average.
const MIN_PERIOD_BETWEEN_FRAMES: duration = Fps.fromValue(120).period;
const MAX_PERIOD_BETWEEN_FRAMES: duration = MIN_FPS_FOR_FREQUENT_LAYER.period;

const HISTORY_SIZE = 90;
const HISTORY_DURATION: duration = Duration.fromMillis(1000);

// Reported rates only move when the calculated rate moves by more than this.
const REPORTED_FPS_MARGIN = 1;

export enum LayerUpdateType {
  // A new buffer was queued.
  Buffer = 'Buffer',
  // An animation transaction.
  AnimationTx = 'AnimationTx',
  // The app set an explicit frame rate.
  SetFrameRate = 'SetFrameRate',
}

// Vote types a layer can fall back to once an explicit vote is removed.
export type DefaultLayerVoteType =
  | LayerVoteType.NoVote
  | LayerVoteType.Min
  | LayerVoteType.Max
  | LayerVoteType.Heuristic;

export interface LayerInfoVote {
  vote: LayerVote;
  seamlessness: Seamlessness;
}

// Where the heuristic snaps its calculated rates to.
export interface KnownFrameRates {
  findClosestKnownFrameRate(frameRate: Fps): Fps;
}

interface FrameTimeData {
  // Desired present time, if the producer gave one.
  presentTime: time;
  queueTime: time;
  pendingModeChange: boolean;
}

interface RefreshRateData {
  refreshRate: Fps;
  timestamp: time;
}

// Recently calculated rates of a layer. The calculation is only trusted once
// they agree with each other.
export class RefreshRateHistory {
  static readonly HISTORY_SIZE = 90;
  static readonly HISTORY_DURATION: duration = Duration.fromMillis(2000);
  static readonly MARGIN_CONSISTENT_FPS = 1;

  private refreshRates: RefreshRateData[] = [];

  clear() {
    this.refreshRates = [];
  }

  get size(): number {
    return this.refreshRates.length;
  }

  // Adds |refreshRate| and returns whether the history is consistent.
  add(refreshRate: Fps, now: time): boolean {
    this.refreshRates.push({refreshRate, timestamp: now});
    while (
      this.refreshRates.length >= RefreshRateHistory.HISTORY_SIZE ||
      Time.diff(now, this.refreshRates[0].timestamp) >
        RefreshRateHistory.HISTORY_DURATION
    ) {
      this.refreshRates.shift();
    }
    return this.isConsistent();
  }

  private isConsistent(): boolean {
    if (this.refreshRates.length === 0) return true;
    const values = this.refreshRates.map((data) => data.refreshRate.value);
    const spread = Math.max(...values) - Math.min(...values);
    return spread < RefreshRateHistory.MARGIN_CONSISTENT_FPS;
  }
}

/**
 * Present history of one layer, and the refresh rate vote derived from it.
 *
 * Unless the app voted explicitly, the vote is a heuristic: Max while the
 * layer animates or while its rate can't be worked out yet, Min while it
 * updates rarely, and otherwise its average frame rate snapped to a known
 * content rate.
 */
export class LayerInfo {
  private defaultVote: DefaultLayerVoteType;
  // Undefined while the heuristic decides.
  private layerVote?: LayerInfoVote;
  private lastUpdatedTime = Time.ZERO;
  private lastAnimationTime = Time.ZERO;
  private frameTimes: FrameTimeData[] = [];
  private frameTimeValidSince: time;
  private readonly refreshRateHistory = new RefreshRateHistory();

  // Last calculated and reported rates, and whether the last vote was Max or
  // Min because of animation or infrequent updates.
  private lastCalculatedRate = Fps.INVALID;
  private lastReportedRate = Fps.INVALID;
  private animatingOrInfrequent = false;

  constructor(
    readonly name: string,
    defaultVote: DefaultLayerVoteType,
    private readonly knownFrameRates: KnownFrameRates,
    now: time = Time.ZERO,
  ) {
    this.defaultVote = defaultVote;
    this.layerVote = voteForDefault(defaultVote);
    this.frameTimeValidSince = now;
  }

  // Records an update of the layer. A present time in the future counts as
  // the update time.
  setLastPresentTime(
    lastPresentTime: time,
    now: time,
    updateType: LayerUpdateType,
    pendingModeChange: boolean,
  ) {
    const presentTime = Time.max(lastPresentTime, Time.ZERO);
    this.lastUpdatedTime = Time.max(presentTime, now);
    switch (updateType) {
      case LayerUpdateType.AnimationTx:
        this.lastAnimationTime = this.lastUpdatedTime;
        break;
      case LayerUpdateType.SetFrameRate:
      case LayerUpdateType.Buffer:
        this.frameTimes.push({
          presentTime,
          queueTime: this.lastUpdatedTime,
          pendingModeChange,
        });
        if (this.frameTimes.length > HISTORY_SIZE) {
          this.frameTimes.shift();
        }
        break;
    }
  }

  getLastUpdatedTime(): time {
    return this.lastUpdatedTime;
  }

  // An explicit vote from the app. A Heuristic vote hands the decision back
  // to the present history.
  setLayerVote(vote: LayerVote, seamlessness = Seamlessness.Default) {
    this.layerVote =
      vote.type === LayerVoteType.Heuristic ? undefined : {vote, seamlessness};
  }

  // The vote resetLayerVote() goes back to.
  setDefaultLayerVote(type: DefaultLayerVoteType) {
    this.defaultVote = type;
  }

  resetLayerVote() {
    this.layerVote = voteForDefault(this.defaultVote);
  }

  getRefreshRateVote(now: time): LayerInfoVote {
    if (this.layerVote !== undefined) {
      return this.layerVote;
    }

    if (this.isAnimating(now)) {
      this.animatingOrInfrequent = true;
      return withDefaultSeamlessness({type: LayerVoteType.Max});
    }

    if (!this.isFrequent(now)) {
      this.animatingOrInfrequent = true;
      return withDefaultSeamlessness({type: LayerVoteType.Min});
    }

    // The layer just changed its behaviour: the history describes how it
    // used to be.
    if (this.animatingOrInfrequent) {
      this.clearHistory(now);
    }

    const refreshRate = this.calculateRefreshRateIfPossible(now);
    if (refreshRate !== undefined) {
      return withDefaultSeamlessness({
        type: LayerVoteType.Heuristic,
        fps: refreshRate,
      });
    }
    return withDefaultSeamlessness({type: LayerVoteType.Max});
  }

  // Forgets the rates calculated so far and ignores frames queued before
  // |now|. The frames themselves are kept to tell whether the layer updates
  // frequently.
  onLayerInactive(now: time) {
    this.frameTimeValidSince = now;
    this.lastCalculatedRate = Fps.INVALID;
    this.lastReportedRate = Fps.INVALID;
    this.animatingOrInfrequent = false;
    this.refreshRateHistory.clear();
  }

  clearHistory(now: time) {
    this.onLayerInactive(now);
    this.frameTimes = [];
  }

  isAnimating(now: time): boolean {
    return (
      Time.isSet(this.lastAnimationTime) &&
      this.lastAnimationTime >= getActiveLayerThreshold(now)
    );
  }

  isFrequent(now: time): boolean {
    // Without data the layer may be starting an animation.
    if (this.frameTimes.length < FREQUENT_LAYER_WINDOW_SIZE) return true;

    const earliest =
      this.frameTimes[this.frameTimes.length - FREQUENT_LAYER_WINDOW_SIZE];
    if (!this.isFrameTimeValid(earliest)) return true;
    return earliest.queueTime >= Time.sub(now, MAX_PERIOD_FOR_FREQUENT_LAYER);
  }

  private isFrameTimeValid(frameTime: FrameTimeData): boolean {
    return frameTime.queueTime >= this.frameTimeValidSince;
  }

  // Either a full history, or a second's worth of frames.
  private hasEnoughDataForHeuristic(): boolean {
    if (this.frameTimes.length < 2) return false;
    const first = this.frameTimes[0];
    const last = this.frameTimes[this.frameTimes.length - 1];
    if (!this.isFrameTimeValid(first)) return false;
    return (
      this.frameTimes.length >= HISTORY_SIZE ||
      Time.diff(last.queueTime, first.queueTime) >= HISTORY_DURATION
    );
  }

  calculateAverageFrameTime(): duration | undefined {
    // Frames around a mode change are paced by the change, not the content.
    if (this.frameTimes.some((frame) => frame.pendingModeChange)) {
      return undefined;
    }

    // Queue times are only trusted to confirm a rate once present times have
    // produced one.
    const isMissingPresentTime = this.frameTimes.some(
      (frame) => !Time.isSet(frame.presentTime),
    );
    if (isMissingPresentTime && !this.lastReportedRate.isValid()) {
      return undefined;
    }
    const getFrameTime = (frame: FrameTimeData) =>
      isMissingPresentTime ? frame.queueTime : frame.presentTime;

    let totalDeltas = 0n;
    let numDeltas = 0n;
    let prevFrame = this.frameTimes[0];
    for (const frame of this.frameTimes.slice(1)) {
      const delta = Time.diff(getFrameTime(frame), getFrameTime(prevFrame));
      if (delta < MIN_PERIOD_BETWEEN_FRAMES) {
        // Duplicate: the delta carries over into the next frame.
        continue;
      }
      prevFrame = frame;
      if (delta > MAX_PERIOD_BETWEEN_FRAMES) {
        continue;
      }
      totalDeltas += delta;
      numDeltas++;
    }
    if (numDeltas === 0n) return undefined;
    return totalDeltas / numDeltas;
  }

  private calculateRefreshRateIfPossible(now: time): Fps | undefined {
    if (!this.hasEnoughDataForHeuristic()) {
      return undefined;
    }

    const averageFrameTime = this.calculateAverageFrameTime();
    if (averageFrameTime !== undefined) {
      const refreshRate = Fps.fromPeriod(averageFrameTime);
      const consistent = this.refreshRateHistory.add(refreshRate, now);
      if (consistent) {
        const knownRefreshRate =
          this.knownFrameRates.findClosestKnownFrameRate(refreshRate);
        // Stick to the last rate while it is close enough, to avoid
        // oscillating between two.
        if (
          Math.abs(this.lastCalculatedRate.value - refreshRate.value) >
            REPORTED_FPS_MARGIN &&
          !this.lastReportedRate.equalsWithMargin(knownRefreshRate)
        ) {
          this.lastCalculatedRate = refreshRate;
          this.lastReportedRate = knownRefreshRate;
        }
      }
    }

    return this.lastReportedRate.isValid() ? this.lastReportedRate : undefined;
  }
}

function voteForDefault(
  type: DefaultLayerVoteType,
): LayerInfoVote | undefined {
  if (type === LayerVoteType.Heuristic) return undefined;
  return withDefaultSeamlessness({type});
}

function withDefaultSeamlessness(vote: LayerVote): LayerInfoVote {
  return {vote, seamlessness: Seamlessness.Default};
}

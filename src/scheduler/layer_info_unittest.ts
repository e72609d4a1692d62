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
import {Duration, Time, time} from '../base/time';
import {
  getActiveLayerThreshold,
  KnownFrameRates,
  LayerInfo,
  LayerUpdateType,
  RefreshRateHistory,
} from './layer_info';
import {LayerVoteType, Seamlessness} from './types';

const START = Time.fromMillis(10_000);
const PERIOD_60 = Fps.fromValue(60).period;

function at(millis: number): time {
  return Time.add(START, Duration.fromMillis(millis));
}

describe('LayerInfo', () => {
  let knownFrameRates: KnownFrameRates;

  beforeEach(() => {
    knownFrameRates = {findClosestKnownFrameRate: () => Fps.fromValue(60)};
  });

  function createLayerInfo(
    defaultVote:
      | LayerVoteType.NoVote
      | LayerVoteType.Min
      | LayerVoteType.Max
      | LayerVoteType.Heuristic = LayerVoteType.Heuristic,
  ) {
    return new LayerInfo('layer1', defaultVote, knownFrameRates);
  }

  function queueBuffer(layerInfo: LayerInfo, t: time, presentTime = t) {
    layerInfo.setLastPresentTime(presentTime, t, LayerUpdateType.Buffer, false);
  }

  // Queues a second's worth of 60fps frames and returns the last queue time.
  function queueFramesAt60Fps(layerInfo: LayerInfo): time {
    let t = START;
    for (let i = 0; i < 62; i++) {
      t = Time.add(START, PERIOD_60 * BigInt(i));
      queueBuffer(layerInfo, t);
    }
    return t;
  }

  test('votes max without enough data', () => {
    const layerInfo = createLayerInfo();
    queueBuffer(layerInfo, at(0));
    expect(layerInfo.getRefreshRateVote(at(0))).toEqual({
      vote: {type: LayerVoteType.Max},
      seamlessness: Seamlessness.Default,
    });
  });

  test('votes min when updated infrequently', () => {
    const layerInfo = createLayerInfo();
    queueBuffer(layerInfo, at(0));
    queueBuffer(layerInfo, at(200));
    queueBuffer(layerInfo, at(400));
    expect(layerInfo.isFrequent(at(400))).toBe(false);
    expect(layerInfo.getRefreshRateVote(at(400)).vote).toEqual({
      type: LayerVoteType.Min,
    });
  });

  test('is frequent while the last few updates are recent', () => {
    const layerInfo = createLayerInfo();
    queueBuffer(layerInfo, at(0));
    queueBuffer(layerInfo, at(50));
    expect(layerInfo.isFrequent(at(5000))).toBe(true);
    queueBuffer(layerInfo, at(100));
    expect(layerInfo.isFrequent(at(100))).toBe(true);
    expect(layerInfo.isFrequent(at(102))).toBe(false);
  });

  test('votes max while animating', () => {
    const layerInfo = createLayerInfo();
    layerInfo.setLastPresentTime(
      Time.ZERO,
      at(0),
      LayerUpdateType.AnimationTx,
      false,
    );
    expect(layerInfo.getLastUpdatedTime()).toBe(at(0));
    expect(layerInfo.isAnimating(at(1000))).toBe(true);
    expect(layerInfo.isAnimating(at(1300))).toBe(false);
    expect(layerInfo.getRefreshRateVote(at(100)).vote).toEqual({
      type: LayerVoteType.Max,
    });
  });

  test('votes the known rate closest to its frame rate', () => {
    const findClosestKnownFrameRate = jest.fn(() => Fps.fromValue(60));
    knownFrameRates = {findClosestKnownFrameRate};
    const layerInfo = createLayerInfo();
    const now = queueFramesAt60Fps(layerInfo);

    expect(layerInfo.getRefreshRateVote(now)).toEqual({
      vote: {type: LayerVoteType.Heuristic, fps: Fps.fromValue(60)},
      seamlessness: Seamlessness.Default,
    });
    expect(findClosestKnownFrameRate).toHaveBeenCalledWith(
      Fps.fromPeriod(PERIOD_60),
    );
  });

  test('keeps its reported rate while the frame rate settles', () => {
    const rate45 = Fps.fromValue(45);
    const rate60 = Fps.fromValue(60);
    knownFrameRates = {
      findClosestKnownFrameRate: (frameRate: Fps) =>
        Math.abs(frameRate.value - 45) < Math.abs(frameRate.value - 60)
          ? rate45
          : rate60,
    };
    const heuristicVote = (fps: Fps) => ({
      vote: {type: LayerVoteType.Heuristic, fps},
      seamlessness: Seamlessness.Default,
    });
    const layerInfo = createLayerInfo();
    let now = queueFramesAt60Fps(layerInfo);
    expect(layerInfo.getRefreshRateVote(now)).toEqual(heuristicVote(rate60));

    const queueFrameAt45Fps = () => {
      now = Time.add(now, rate45.period);
      queueBuffer(layerInfo, now);
      return layerInfo.getRefreshRateVote(now);
    };

    // The first frame moves the average by less than 1fps.
    expect(queueFrameAt45Fps()).toEqual(heuristicVote(rate60));
    expect(layerInfo.calculateAverageFrameTime()).toBe(
      (PERIOD_60 * 61n + rate45.period) / 62n,
    );

    // Then the recent rates disagree with each other.
    for (let i = 1; i < 60; i++) {
      expect(queueFrameAt45Fps()).toEqual(heuristicVote(rate60));
    }
    const averageRate = Fps.fromPeriod(
      layerInfo.calculateAverageFrameTime() ?? 0n,
    );
    expect(knownFrameRates.findClosestKnownFrameRate(averageRate)).toBe(
      rate45,
    );

    // Once the 60fps rates have aged out the vote follows.
    for (let i = 60; i < 200; i++) {
      queueFrameAt45Fps();
    }
    expect(queueFrameAt45Fps()).toEqual(heuristicVote(rate45));
  });

  test('inactive layers start over', () => {
    const layerInfo = createLayerInfo();
    const now = queueFramesAt60Fps(layerInfo);
    layerInfo.onLayerInactive(now);
    expect(layerInfo.getRefreshRateVote(now).vote).toEqual({
      type: LayerVoteType.Max,
    });
  });

  test('average frame time', () => {
    const layerInfo = createLayerInfo();
    queueBuffer(layerInfo, at(0));
    // Duplicate of the previous frame.
    queueBuffer(layerInfo, at(4));
    queueBuffer(layerInfo, at(20));
    // After a pause.
    queueBuffer(layerInfo, at(220));
    queueBuffer(layerInfo, at(240));
    expect(layerInfo.calculateAverageFrameTime()).toBe(
      Duration.fromMillis(20),
    );
  });

  test('no average frame time without present times', () => {
    const layerInfo = createLayerInfo();
    queueBuffer(layerInfo, at(0), Time.ZERO);
    queueBuffer(layerInfo, at(20), Time.ZERO);
    expect(layerInfo.calculateAverageFrameTime()).toBeUndefined();
  });

  test('no average frame time across a mode change', () => {
    const layerInfo = createLayerInfo();
    queueBuffer(layerInfo, at(0));
    layerInfo.setLastPresentTime(at(20), at(20), LayerUpdateType.Buffer, true);
    expect(layerInfo.calculateAverageFrameTime()).toBeUndefined();
  });

  test('explicit votes', () => {
    const layerInfo = createLayerInfo(LayerVoteType.Min);
    expect(layerInfo.getRefreshRateVote(at(0)).vote).toEqual({
      type: LayerVoteType.Min,
    });

    const explicitVote = {
      type: LayerVoteType.ExplicitDefault,
      fps: Fps.fromValue(30),
    } as const;
    layerInfo.setLayerVote(explicitVote, Seamlessness.OnlySeamless);
    expect(layerInfo.getRefreshRateVote(at(0))).toEqual({
      vote: explicitVote,
      seamlessness: Seamlessness.OnlySeamless,
    });

    // Hands the vote back to the present history.
    layerInfo.setLayerVote({type: LayerVoteType.Heuristic, fps: Fps.INVALID});
    expect(layerInfo.getRefreshRateVote(at(0)).vote).toEqual({
      type: LayerVoteType.Max,
    });

    layerInfo.resetLayerVote();
    expect(layerInfo.getRefreshRateVote(at(0)).vote).toEqual({
      type: LayerVoteType.Min,
    });

    layerInfo.setDefaultLayerVote(LayerVoteType.NoVote);
    layerInfo.resetLayerVote();
    expect(layerInfo.getRefreshRateVote(at(0)).vote).toEqual({
      type: LayerVoteType.NoVote,
    });
  });

  test('active layer threshold', () => {
    expect(getActiveLayerThreshold(at(1200))).toBe(START);
  });
});

describe('RefreshRateHistory', () => {
  test('consistent while the rates agree', () => {
    const history = new RefreshRateHistory();
    expect(history.add(Fps.fromValue(60), at(0))).toBe(true);
    expect(history.add(Fps.fromValue(60.5), at(1))).toBe(true);
    expect(history.add(Fps.fromValue(62), at(2))).toBe(false);
    // The earlier rates are too old to count.
    expect(history.add(Fps.fromValue(62), at(3000))).toBe(true);
    expect(history.size).toBe(1);
  });

  test('is bounded', () => {
    const history = new RefreshRateHistory();
    for (let i = 0; i < 100; i++) {
      history.add(Fps.fromValue(60), at(0));
    }
    expect(history.size).toBe(RefreshRateHistory.HISTORY_SIZE - 1);
    history.clear();
    expect(history.size).toBe(0);
  });
});

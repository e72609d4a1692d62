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
import {FatalError} from '../base/logging';
import {
  getDisplayFrames,
  getFrameRateDivider,
  RefreshRateConfigs,
} from './refresh_rate_configs';
import {
  DisplayMode,
  KernelIdleTimerAction,
  LayerRequirement,
  LayerVote,
  LayerVoteType,
  makePolicy,
  PolicyStatus,
  Seamlessness,
} from './types';

const MODE_60: DisplayMode = {id: 0, vsyncPeriod: 16_666_666n, group: 0};
const MODE_90: DisplayMode = {id: 1, vsyncPeriod: 11_111_111n, group: 0};
const MODE_120: DisplayMode = {id: 2, vsyncPeriod: 8_333_333n, group: 0};
const MODE_90_OTHER_GROUP: DisplayMode = {...MODE_90, group: 1};

const MODES = [MODE_60, MODE_90, MODE_120];

const NO_SIGNALS = {touch: false, idle: false};

function fps(value: number) {
  return Fps.fromValue(value);
}

function range(min: number, max: number) {
  return {min: fps(min), max: fps(max)};
}

function layer(
  vote: LayerVote,
  overrides: Partial<LayerRequirement> = {},
): LayerRequirement {
  return {
    name: 'layer1',
    ownerUid: 1000,
    vote,
    seamlessness: Seamlessness.Default,
    weight: 1,
    focused: false,
    ...overrides,
  };
}

describe('RefreshRateConfigs', () => {
  let warn: jest.SpyInstance;

  beforeEach(() => {
    warn = jest.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    warn.mockRestore();
  });

  function bestConfigId(
    configs: RefreshRateConfigs,
    layers: LayerRequirement[],
    signals = NO_SIGNALS,
  ) {
    return configs.getBestRefreshRate(layers, signals).refreshRate.configId;
  }

  test('construction', () => {
    const configs = new RefreshRateConfigs(MODES, 0);
    expect(configs.getCurrentRefreshRate().configId).toBe(0);
    expect(
      configs.getPrimaryRefreshRates().map((rate) => rate.configId),
    ).toEqual([0, 1, 2]);
    const {min, max} = configs.getSupportedRefreshRateRange();
    expect(min.intValue()).toBe(60);
    expect(max.intValue()).toBe(120);
    expect(configs.canSwitch()).toBe(true);
    expect(new RefreshRateConfigs([MODE_60], 0).canSwitch()).toBe(false);
  });

  test('construction fails without a usable mode', () => {
    expect(() => new RefreshRateConfigs([], 0)).toThrow(FatalError);
    expect(() => new RefreshRateConfigs(MODES, 7)).toThrow(FatalError);
  });

  test('only the default group is available without group switching', () => {
    const configs = new RefreshRateConfigs([MODE_60, MODE_90_OTHER_GROUP], 0);
    expect(
      configs.getAppRequestRefreshRates().map((rate) => rate.configId),
    ).toEqual([0]);
    expect(configs.isConfigAllowed(1)).toBe(false);
  });

  test('display manager policy', () => {
    const configs = new RefreshRateConfigs(MODES, 0);
    expect(configs.setDisplayManagerPolicy(makePolicy(7, range(60, 90)))).toBe(
      PolicyStatus.Rejected,
    );
    // The default config must be in the primary range.
    expect(configs.setDisplayManagerPolicy(makePolicy(2, range(60, 90)))).toBe(
      PolicyStatus.Rejected,
    );
    // The app request range must contain the primary range.
    expect(
      configs.setDisplayManagerPolicy(
        makePolicy(1, range(60, 90), range(60, 60)),
      ),
    ).toBe(PolicyStatus.Rejected);

    expect(configs.setDisplayManagerPolicy(makePolicy(1, range(60, 90)))).toBe(
      PolicyStatus.Updated,
    );
    expect(configs.setDisplayManagerPolicy(makePolicy(1, range(60, 90)))).toBe(
      PolicyStatus.Unchanged,
    );
    expect(
      configs.getPrimaryRefreshRates().map((rate) => rate.configId),
    ).toEqual([0, 1]);
    expect(configs.isConfigAllowed(2)).toBe(false);
  });

  test('override policy', () => {
    const configs = new RefreshRateConfigs(MODES, 0);
    const displayManagerPolicy = makePolicy(1, range(60, 90));
    configs.setDisplayManagerPolicy(displayManagerPolicy);

    expect(configs.setOverridePolicy(makePolicy(1, range(60, 90)))).toBe(
      PolicyStatus.Unchanged,
    );
    expect(configs.setOverridePolicy(makePolicy(2, range(120, 120)))).toBe(
      PolicyStatus.Updated,
    );
    expect(configs.getCurrentPolicy().defaultConfig).toBe(2);
    expect(configs.getDisplayManagerPolicy()).toBe(displayManagerPolicy);
    expect(configs.getCurrentRefreshRateByPolicy().configId).toBe(2);

    expect(configs.setOverridePolicy(undefined)).toBe(PolicyStatus.Updated);
    expect(configs.getCurrentPolicy()).toBe(displayManagerPolicy);
    expect(configs.getCurrentRefreshRateByPolicy().configId).toBe(0);
  });

  test('no layers and no votes pick the max', () => {
    const configs = new RefreshRateConfigs(MODES, 0);
    expect(bestConfigId(configs, [])).toBe(2);
    expect(bestConfigId(configs, [layer({type: LayerVoteType.NoVote})])).toBe(
      2,
    );
    expect(
      bestConfigId(configs, [
        layer({type: LayerVoteType.NoVote}),
        layer({type: LayerVoteType.Min}),
      ]),
    ).toBe(0);
  });

  test('touch and idle', () => {
    const configs = new RefreshRateConfigs(MODES, 0);
    const heuristic = layer({type: LayerVoteType.Heuristic, fps: fps(60)});

    expect(
      configs.getBestRefreshRate([heuristic], {touch: true, idle: false}),
    ).toEqual({
      refreshRate: configs.getRefreshRateFromConfigId(2),
      signalsConsidered: {touch: true, idle: false},
    });
    expect(
      configs.getBestRefreshRate([heuristic], {touch: false, idle: true}),
    ).toEqual({
      refreshRate: configs.getRefreshRateFromConfigId(0),
      signalsConsidered: {touch: false, idle: true},
    });
  });

  test('heuristic votes prefer the lowest rate that fits', () => {
    const configs = new RefreshRateConfigs(MODES, 0);
    const heuristic = layer({type: LayerVoteType.Heuristic, fps: fps(60)});
    expect(bestConfigId(configs, [heuristic])).toBe(0);
    expect(
      bestConfigId(configs, [heuristic, layer({type: LayerVoteType.Max})]),
    ).toBe(2);
  });

  test('touch boosts unless a layer asked for its rate explicitly', () => {
    const configs = new RefreshRateConfigs(MODES, 0);
    const touch = {touch: true, idle: false};

    const exactOrMultiple = layer({
      type: LayerVoteType.ExplicitExactOrMultiple,
      fps: fps(60),
    });
    expect(configs.getBestRefreshRate([exactOrMultiple], touch)).toEqual({
      refreshRate: configs.getRefreshRateFromConfigId(2),
      signalsConsidered: {touch: true, idle: false},
    });

    const explicitDefault = layer({
      type: LayerVoteType.ExplicitDefault,
      fps: fps(60),
    });
    expect(configs.getBestRefreshRate([explicitDefault], touch)).toEqual({
      refreshRate: configs.getRefreshRateFromConfigId(0),
      signalsConsidered: {touch: false, idle: false},
    });
  });

  test('explicit exact rates that need an override', () => {
    const primary = makePolicy(1, range(60, 90), range(60, 120));
    const exact30 = layer(
      {type: LayerVoteType.ExplicitExact, fps: fps(30)},
      {focused: true},
    );

    // No mode runs at exactly 30fps: nothing scores and the max wins.
    const configs = new RefreshRateConfigs(MODES, 0);
    configs.setDisplayManagerPolicy(primary);
    expect(bestConfigId(configs, [exact30])).toBe(1);

    // With overrides every multiple of 30 fits. The lowest one wins.
    const withOverrides = new RefreshRateConfigs(MODES, 0, {
      enableFrameRateOverride: true,
    });
    withOverrides.setDisplayManagerPolicy(primary);
    expect(bestConfigId(withOverrides, [exact30])).toBe(0);
  });

  test('seamlessness', () => {
    const configs = new RefreshRateConfigs([MODE_60, MODE_90_OTHER_GROUP], 0);
    configs.setDisplayManagerPolicy(
      makePolicy(0, range(60, 90), range(60, 90), true),
    );
    const vote90 = {type: LayerVoteType.Heuristic, fps: fps(90)} as const;

    expect(
      bestConfigId(configs, [
        layer(vote90, {seamlessness: Seamlessness.OnlySeamless}),
      ]),
    ).toBe(0);
    expect(bestConfigId(configs, [layer(vote90)])).toBe(0);
    expect(
      bestConfigId(configs, [
        layer(vote90, {
          seamlessness: Seamlessness.SeamedAndSeamless,
          focused: true,
        }),
      ]),
    ).toBe(1);
  });

  test('frame rate overrides', () => {
    const configs = new RefreshRateConfigs(MODES, 2);
    const layers = [
      layer({type: LayerVoteType.ExplicitExact, fps: fps(30)}, {ownerUid: 1}),
      layer({type: LayerVoteType.ExplicitDefault, fps: fps(30)}, {ownerUid: 1}),
      // Conflicting votes.
      layer({type: LayerVoteType.ExplicitExact, fps: fps(60)}, {ownerUid: 2}),
      layer({type: LayerVoteType.ExplicitExact, fps: fps(30)}, {ownerUid: 2}),
      // Doesn't divide 120.
      layer({type: LayerVoteType.ExplicitExact, fps: fps(50)}, {ownerUid: 3}),
      layer({type: LayerVoteType.Heuristic, fps: fps(30)}, {ownerUid: 4}),
    ];

    const overrides = configs.getFrameRateOverrides(layers, fps(120), false);
    expect([...overrides.keys()]).toEqual([1]);
    expect(overrides.get(1)).toEqual(fps(30));
    expect(configs.getFrameRateOverrides(layers, fps(120), true).size).toBe(0);
  });

  test('supports frame rate override', () => {
    expect(new RefreshRateConfigs(MODES, 0).supportsFrameRateOverride()).toBe(
      false,
    );
    const config = {enableFrameRateOverride: true};
    expect(
      new RefreshRateConfigs(MODES, 0, config).supportsFrameRateOverride(),
    ).toBe(true);
    expect(
      new RefreshRateConfigs(
        [MODE_60, MODE_90],
        0,
        config,
      ).supportsFrameRateOverride(),
    ).toBe(false);
  });

  test('idle timer action', () => {
    const configs = new RefreshRateConfigs(MODES, 0);
    expect(configs.getIdleTimerAction()).toBe(KernelIdleTimerAction.TurnOn);

    configs.setDisplayManagerPolicy(makePolicy(1, range(90, 120)));
    expect(configs.getIdleTimerAction()).toBe(KernelIdleTimerAction.TurnOff);

    configs.setDisplayManagerPolicy(makePolicy(0, range(60, 60)));
    expect(configs.getIdleTimerAction()).toBe(KernelIdleTimerAction.NoChange);
  });

  test('kernel idle timer', () => {
    const configs = new RefreshRateConfigs(MODES, 0);
    expect(configs.onKernelTimerChanged(undefined, true)).toBeUndefined();
    expect(configs.onKernelTimerChanged(2, true)?.intValue()).toBe(60);
    expect(configs.onKernelTimerChanged(2, false)?.intValue()).toBe(120);
  });

  test('known frame rates', () => {
    const configs = new RefreshRateConfigs(MODES, 0);
    expect(
      configs.getKnownFrameRates().map((rate) => rate.intValue()),
    ).toEqual([24, 30, 45, 60, 72, 90, 120]);
    const closest = (value: number) =>
      configs.findClosestKnownFrameRate(fps(value)).intValue();
    expect(closest(20)).toBe(24);
    expect(closest(31)).toBe(30);
    expect(closest(50)).toBe(45);
    expect(closest(88)).toBe(90);
    expect(closest(130)).toBe(120);
  });

  test('refresh rate divider', () => {
    const configs = new RefreshRateConfigs(MODES, 0);
    expect(configs.getRefreshRateDivider(fps(30))).toBe(2);
    expect(configs.getRefreshRateDivider(fps(45))).toBe(0);
    expect(configs.getRefreshRateDivider(Fps.INVALID)).toBe(0);
    configs.setCurrentConfigId(2);
    expect(configs.getRefreshRateDivider(fps(30))).toBe(4);
    expect(getFrameRateDivider(fps(60), fps(24))).toBe(0);
  });

  test('display frames', () => {
    expect(getDisplayFrames(16_666_666n, 16_666_666n)).toEqual({
      quotient: 2n,
      remainder: 0n,
    });
    expect(getDisplayFrames(16_666_666n, 11_111_111n)).toEqual({
      quotient: 1n,
      remainder: 5_555_555n,
    });
  });

  test('update display configs', () => {
    const configs = new RefreshRateConfigs(MODES, 0);
    configs.setOverridePolicy(makePolicy(2, range(120, 120)));

    configs.updateDisplayConfigs([MODE_60, MODE_90], 1);
    expect(configs.getCurrentRefreshRate().configId).toBe(1);
    expect(configs.getCurrentPolicy().defaultConfig).toBe(1);
    expect(
      configs.getPrimaryRefreshRates().map((rate) => rate.configId),
    ).toEqual([0, 1]);
    expect(warn).toHaveBeenCalledWith(
      'RefreshRateConfigs: dropping override policy, its default config ' +
        '2 is gone',
    );
  });

  test('dump', () => {
    const configs = new RefreshRateConfigs([MODE_60, MODE_120], 0);
    configs.setDisplayManagerPolicy(makePolicy(0, range(60, 120)));
    configs.setOverridePolicy(makePolicy(2, range(120, 120)));
    expect(configs.dump().split('\n')).toEqual([
      'DesiredDisplayConfigSpecs (DisplayManager): default config ID: 0, ' +
        'allowGroupSwitching = false, primary range: [60.00fps 120.00fps], ' +
        'app request range: [60.00fps 120.00fps]',
      'DesiredDisplayConfigSpecs (Override): default config ID: 2, ' +
        'allowGroupSwitching = false, primary range: [120.00fps 120.00fps], ' +
        'app request range: [120.00fps 120.00fps]',
      '',
      'Current config: {id=0, fps=60.00, group=0}',
      'Refresh rates:',
      '{id=0, fps=60.00, group=0}',
      '{id=2, fps=120.00, group=0}',
      'Supports Frame Rate Override: no',
      '',
    ]);
  });
});

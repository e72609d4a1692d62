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
import {assertExists, fail} from '../base/logging';
import {Duration, duration} from '../base/time';
import {parseConfig, SchedulerConfig} from '../config';
import {
  DisplayMode,
  DisplayModeId,
  FpsRange,
  GlobalSignals,
  isExplicitVote,
  KernelIdleTimerAction,
  LayerRequirement,
  LayerVoteType,
  makePolicy,
  Policy,
  policyEquals,
  PolicyStatus,
  policyToString,
  RefreshRate,
  Seamlessness,
  UNBOUNDED_FPS_RANGE,
} from './types';

// Periods closer than this are considered equal.
export const MARGIN_FOR_PERIOD_CALCULATION: duration = 800_000n;

// Slightly prefer seamless switches.
const SEAMED_SWITCH_PENALTY = 0.95;

// A cadence that needs more display frames than this to fit scores ~0.
const MAX_FRAMES_TO_FIT = 10;

// Relative margin for two scores to be considered different.
const SCORE_EPSILON = 0.001;

// How far from a whole number of periods a rate may be and still divide
// another one.
const DIVIDER_THRESHOLD = 0.1;

export interface BestRefreshRate {
  refreshRate: RefreshRate;
  // The global signals that decided the outcome.
  signalsConsidered: GlobalSignals;
}

interface Score {
  refreshRate: RefreshRate;
  score: number;
}

// Number of display vsyncs per frame of |layerFrameRate|, or 0 if it does not
// divide |displayFrameRate|.
export function getFrameRateDivider(
  displayFrameRate: Fps,
  layerFrameRate: Fps,
): number {
  if (!layerFrameRate.isValid()) return 0;
  const numPeriods = displayFrameRate.value / layerFrameRate.value;
  const numPeriodsRounded = Math.round(numPeriods);
  if (Math.abs(numPeriods - numPeriodsRounded) > DIVIDER_THRESHOLD) {
    return 0;
  }
  return numPeriodsRounded;
}

/**
 * The refresh rates a display supports and the policy that restricts them.
 * Picks the rate that best satisfies the layers on screen.
 *
 * There are two policies: the display manager's and an optional override
 * (e.g. from a developer setting). The override wins while it is set.
 */
export class RefreshRateConfigs {
  private refreshRates = new Map<DisplayModeId, RefreshRate>();
  // Sorted by ascending fps.
  private primaryRefreshRates: RefreshRate[] = [];
  private appRequestRefreshRates: RefreshRate[] = [];
  private currentRefreshRate: RefreshRate;
  private minSupportedRefreshRate: RefreshRate;
  private maxSupportedRefreshRate: RefreshRate;
  private displayManagerPolicy: Policy;
  private overridePolicy?: Policy;
  private knownFrameRates: Fps[] = [];
  private supportsFrameRateOverrideValue = false;
  private readonly config: SchedulerConfig;

  constructor(
    modes: ReadonlyArray<DisplayMode>,
    currentConfigId: DisplayModeId,
    config: Partial<SchedulerConfig> = {},
  ) {
    this.config = {...parseConfig().scheduler, ...config};
    const current = this.loadModes(modes, currentConfigId);
    this.currentRefreshRate = current.refreshRate;
    this.minSupportedRefreshRate = current.min;
    this.maxSupportedRefreshRate = current.max;
    this.displayManagerPolicy = makePolicy(
      currentConfigId,
      UNBOUNDED_FPS_RANGE,
    );
    this.constructAvailableRefreshRates();
  }

  // Replaces the supported modes, e.g. after a hotplug. The display manager
  // policy is reset to allow every mode with the current one as default.
  updateDisplayConfigs(
    modes: ReadonlyArray<DisplayMode>,
    currentConfigId: DisplayModeId,
  ) {
    const current = this.loadModes(modes, currentConfigId);
    this.currentRefreshRate = current.refreshRate;
    this.minSupportedRefreshRate = current.min;
    this.maxSupportedRefreshRate = current.max;
    this.displayManagerPolicy = makePolicy(
      currentConfigId,
      UNBOUNDED_FPS_RANGE,
    );
    if (
      this.overridePolicy !== undefined &&
      !this.isPolicyValid(this.overridePolicy)
    ) {
      console.warn(
        'RefreshRateConfigs: dropping override policy, its default config ' +
          `${this.overridePolicy.defaultConfig} is gone`,
      );
      this.overridePolicy = undefined;
    }
    this.constructAvailableRefreshRates();
  }

  private loadModes(
    modes: ReadonlyArray<DisplayMode>,
    currentConfigId: DisplayModeId,
  ): {refreshRate: RefreshRate; min: RefreshRate; max: RefreshRate} {
    if (modes.length === 0) {
      fail('RefreshRateConfigs: no display modes');
    }
    this.refreshRates = new Map(
      modes.map((mode) => [mode.id, new RefreshRate(mode)]),
    );
    const refreshRate = assertExists(
      this.refreshRates.get(currentConfigId),
      `display mode ${currentConfigId}`,
    );
    const sorted = this.getSortedRefreshRateList(() => true);
    const min = sorted[0];
    const max = sorted[sorted.length - 1];

    const knownFrameRates = [...this.config.knownFrameRates];
    for (const rate of sorted) knownFrameRates.push(rate.fps);
    knownFrameRates.sort(Fps.compare);
    this.knownFrameRates = knownFrameRates.filter(
      (fps, i) => i === 0 || !fps.equalsWithMargin(knownFrameRates[i - 1]),
    );

    // Overrides only help if some mode runs at a multiple of another.
    this.supportsFrameRateOverrideValue =
      this.config.enableFrameRateOverride &&
      sorted.some((a) =>
        sorted.some((b) => getFrameRateDivider(a.fps, b.fps) >= 2),
      );
    return {refreshRate, min, max};
  }

  supportsFrameRateOverride(): boolean {
    return this.supportsFrameRateOverrideValue;
  }

  setDisplayManagerPolicy(policy: Policy): PolicyStatus {
    if (!this.isPolicyValid(policy)) {
      console.warn(
        `RefreshRateConfigs: invalid refresh rate policy: ` +
          policyToString(policy),
      );
      return PolicyStatus.Rejected;
    }
    const previousPolicy = this.getCurrentPolicy();
    this.displayManagerPolicy = policy;
    if (policyEquals(this.getCurrentPolicy(), previousPolicy)) {
      return PolicyStatus.Unchanged;
    }
    this.constructAvailableRefreshRates();
    return PolicyStatus.Updated;
  }

  setOverridePolicy(policy: Policy | undefined): PolicyStatus {
    if (policy !== undefined && !this.isPolicyValid(policy)) {
      console.warn(
        'RefreshRateConfigs: invalid override policy: ' +
          policyToString(policy),
      );
      return PolicyStatus.Rejected;
    }
    const previousPolicy = this.getCurrentPolicy();
    this.overridePolicy = policy;
    if (policyEquals(this.getCurrentPolicy(), previousPolicy)) {
      return PolicyStatus.Unchanged;
    }
    this.constructAvailableRefreshRates();
    return PolicyStatus.Updated;
  }

  getCurrentPolicy(): Policy {
    return this.overridePolicy ?? this.displayManagerPolicy;
  }

  getDisplayManagerPolicy(): Policy {
    return this.displayManagerPolicy;
  }

  isConfigAllowed(configId: DisplayModeId): boolean {
    return this.appRequestRefreshRates.some(
      (refreshRate) => refreshRate.configId === configId,
    );
  }

  getPrimaryRefreshRates(): ReadonlyArray<RefreshRate> {
    return this.primaryRefreshRates;
  }

  getAppRequestRefreshRates(): ReadonlyArray<RefreshRate> {
    return this.appRequestRefreshRates;
  }

  getSupportedRefreshRateRange(): FpsRange {
    return {
      min: this.minSupportedRefreshRate.fps,
      max: this.maxSupportedRefreshRate.fps,
    };
  }

  canSwitch(): boolean {
    return this.refreshRates.size > 1;
  }

  getCurrentRefreshRate(): RefreshRate {
    return this.currentRefreshRate;
  }

  // The current rate if the policy allows it, the policy's default otherwise.
  getCurrentRefreshRateByPolicy(): RefreshRate {
    if (this.appRequestRefreshRates.includes(this.currentRefreshRate)) {
      return this.currentRefreshRate;
    }
    return this.getRefreshRateFromConfigId(
      this.getCurrentPolicy().defaultConfig,
    );
  }

  getRefreshRateFromConfigId(configId: DisplayModeId): RefreshRate {
    return assertExists(
      this.refreshRates.get(configId),
      `display mode ${configId}`,
    );
  }

  setCurrentConfigId(configId: DisplayModeId) {
    this.currentRefreshRate = this.getRefreshRateFromConfigId(configId);
  }

  getMinRefreshRateByPolicy(): RefreshRate {
    // Prefer rates reachable without a seamed switch.
    const sameGroup = this.primaryRefreshRates.find(
      (refreshRate) =>
        refreshRate.configGroup === this.currentRefreshRate.configGroup,
    );
    if (sameGroup !== undefined) return sameGroup;
    console.warn(
      'RefreshRateConfigs: no min refresh rate by policy in the group of ' +
        `the current config ${this.currentRefreshRate}`,
    );
    return this.primaryRefreshRates[0];
  }

  getMaxRefreshRateByPolicy(): RefreshRate {
    for (let i = this.primaryRefreshRates.length - 1; i >= 0; i--) {
      const refreshRate = this.primaryRefreshRates[i];
      if (refreshRate.configGroup === this.currentRefreshRate.configGroup) {
        return refreshRate;
      }
    }
    console.warn(
      'RefreshRateConfigs: no max refresh rate by policy in the group of ' +
        `the current config ${this.currentRefreshRate}`,
    );
    return this.primaryRefreshRates[this.primaryRefreshRates.length - 1];
  }

  getBestRefreshRate(
    layers: ReadonlyArray<LayerRequirement>,
    globalSignals: GlobalSignals,
  ): BestRefreshRate {
    const considered: GlobalSignals = {touch: false, idle: false};
    const result = (refreshRate: RefreshRate): BestRefreshRate => ({
      refreshRate,
      signalsConsidered: considered,
    });

    let noVoteLayers = 0;
    let minVoteLayers = 0;
    let maxVoteLayers = 0;
    let explicitDefaultVoteLayers = 0;
    let explicitExactOrMultipleVoteLayers = 0;
    let explicitExactVoteLayers = 0;
    let seamedFocusedLayers = 0;
    for (const layer of layers) {
      switch (layer.vote.type) {
        case LayerVoteType.NoVote:
          noVoteLayers++;
          break;
        case LayerVoteType.Min:
          minVoteLayers++;
          break;
        case LayerVoteType.Max:
          maxVoteLayers++;
          break;
        case LayerVoteType.ExplicitDefault:
          explicitDefaultVoteLayers++;
          break;
        case LayerVoteType.ExplicitExactOrMultiple:
          explicitExactOrMultipleVoteLayers++;
          break;
        case LayerVoteType.ExplicitExact:
          explicitExactVoteLayers++;
          break;
        case LayerVoteType.Heuristic:
          break;
      }
      if (
        layer.seamlessness === Seamlessness.SeamedAndSeamless &&
        layer.focused
      ) {
        seamedFocusedLayers++;
      }
    }

    const hasExplicitVoteLayers =
      explicitDefaultVoteLayers > 0 ||
      explicitExactOrMultipleVoteLayers > 0 ||
      explicitExactVoteLayers > 0;

    // With explicit votes around, touch is only considered once a rate has
    // been picked.
    if (globalSignals.touch && !hasExplicitVoteLayers) {
      considered.touch = true;
      return result(this.getMaxRefreshRateByPolicy());
    }

    // A single-rate primary range can only be left on explicit request.
    const policy = this.getCurrentPolicy();
    const primaryRangeIsSingleRate = policy.primaryRange.min.equalsWithMargin(
      policy.primaryRange.max,
    );

    if (
      !globalSignals.touch &&
      globalSignals.idle &&
      !(primaryRangeIsSingleRate && hasExplicitVoteLayers)
    ) {
      considered.idle = true;
      return result(this.getMinRefreshRateByPolicy());
    }

    if (layers.length === 0 || noVoteLayers === layers.length) {
      return result(this.getMaxRefreshRateByPolicy());
    }

    if (noVoteLayers + minVoteLayers === layers.length) {
      return result(this.getMinRefreshRateByPolicy());
    }

    const scores: Score[] = this.appRequestRefreshRates.map(
      (refreshRate) => ({refreshRate, score: 0}),
    );
    const defaultConfig = this.getRefreshRateFromConfigId(
      policy.defaultConfig,
    );

    for (const layer of layers) {
      if (
        layer.vote.type === LayerVoteType.NoVote ||
        layer.vote.type === LayerVoteType.Min
      ) {
        continue;
      }
      const weight = layer.focused ? layer.weight * 2 : layer.weight;
      const mayLeavePrimaryRange =
        layer.focused &&
        (layer.vote.type === LayerVoteType.ExplicitDefault ||
          layer.vote.type === LayerVoteType.ExplicitExact);

      for (const entry of scores) {
        const {refreshRate} = entry;
        const isSeamlessSwitch =
          refreshRate.configGroup === this.currentRefreshRate.configGroup;

        if (
          layer.seamlessness === Seamlessness.OnlySeamless &&
          !isSeamlessSwitch
        ) {
          continue;
        }
        if (
          layer.seamlessness === Seamlessness.SeamedAndSeamless &&
          !isSeamlessSwitch &&
          !layer.focused
        ) {
          continue;
        }
        // Default seamlessness follows the current group while a focused
        // layer allows seamed switches, and the default config's group
        // otherwise.
        const isInPolicyForDefault =
          seamedFocusedLayers > 0
            ? refreshRate.configGroup === this.currentRefreshRate.configGroup
            : refreshRate.configGroup === defaultConfig.configGroup;
        if (
          layer.seamlessness === Seamlessness.Default &&
          !isInPolicyForDefault
        ) {
          continue;
        }

        const inPrimaryRange = refreshRate.inPolicy(
          policy.primaryRange.min,
          policy.primaryRange.max,
        );
        if (
          (primaryRangeIsSingleRate || !inPrimaryRange) &&
          !mayLeavePrimaryRange
        ) {
          continue;
        }

        entry.score +=
          weight *
          this.calculateLayerScore(layer, refreshRate, isSeamlessSwitch);
      }
    }

    // Nothing scored: there is no preference among the app request rates.
    if (scores.every((entry) => entry.score === 0)) {
      return result(this.getMaxRefreshRateByPolicy());
    }

    // On a tie prefer the higher rate if any layer wanted Max, the lower one
    // otherwise.
    const bestRefreshRate =
      maxVoteLayers > 0
        ? getBestScore([...scores].reverse())
        : getBestScore(scores);

    if (primaryRangeIsSingleRate) {
      return result(bestRefreshRate);
    }

    // ExplicitDefault layers are mostly interactive and already asked for
    // the rate they need: a touch doesn't override them. Only boost if it
    // actually raises the rate.
    const touchRefreshRate = this.getMaxRefreshRateByPolicy();
    const touchBoostForExplicitExact = this.supportsFrameRateOverrideValue
      ? explicitExactVoteLayers + noVoteLayers !== layers.length
      : explicitExactVoteLayers === 0;
    if (
      globalSignals.touch &&
      explicitDefaultVoteLayers === 0 &&
      touchBoostForExplicitExact &&
      bestRefreshRate.fps.lessThanWithMargin(touchRefreshRate.fps)
    ) {
      considered.touch = true;
      return result(touchRefreshRate);
    }

    return result(bestRefreshRate);
  }

  // How well |refreshRate| satisfies |layer|, in [0, 1].
  private calculateLayerScore(
    layer: LayerRequirement,
    refreshRate: RefreshRate,
    isSeamlessSwitch: boolean,
  ): number {
    const seamlessness = isSeamlessSwitch ? 1 : SEAMED_SWITCH_PENALTY;
    const {vote} = layer;
    switch (vote.type) {
      case LayerVoteType.NoVote:
      case LayerVoteType.Min:
        return 0;
      case LayerVoteType.Max: {
        // Falls off quadratically away from the peak.
        const maxFps =
          this.appRequestRefreshRates[this.appRequestRefreshRates.length - 1]
            .fps;
        const ratio = refreshRate.fps.value / maxFps.value;
        return ratio * ratio;
      }
      case LayerVoteType.ExplicitDefault: {
        // The layer renders a frame every |layerPeriod| at best, so it shows
        // up on the first vsync after that.
        const displayPeriod = refreshRate.vsyncPeriod;
        const layerPeriod = vote.fps.period;
        let actualLayerPeriod = displayPeriod;
        let multiplier = 1n;
        while (
          layerPeriod >
          actualLayerPeriod + MARGIN_FOR_PERIOD_CALCULATION
        ) {
          multiplier++;
          actualLayerPeriod = displayPeriod * multiplier;
        }
        return Math.min(1, Number(layerPeriod) / Number(actualLayerPeriod));
      }
      case LayerVoteType.Heuristic:
      case LayerVoteType.ExplicitExactOrMultiple: {
        const displayPeriod = refreshRate.vsyncPeriod;
        const layerPeriod = vote.fps.period;
        const {quotient, remainder} = getDisplayFrames(
          layerPeriod,
          displayPeriod,
        );
        if (remainder === 0n) {
          // The layer's rate is a divider of the display's.
          return seamlessness;
        }
        if (quotient === 0n) {
          // The layer wants a higher rate than the display's.
          return (
            (Number(layerPeriod) / Number(displayPeriod)) *
            (1 / (MAX_FRAMES_TO_FIT + 1))
          );
        }
        // The layer wants a lower rate: score how well its frames fit the
        // display's cadence.
        let diff = Duration.abs(remainder - (displayPeriod - remainder));
        let iter = 2;
        while (
          diff > MARGIN_FOR_PERIOD_CALCULATION &&
          iter < MAX_FRAMES_TO_FIT
        ) {
          diff = diff - (displayPeriod - diff);
          iter++;
        }
        return (1 / iter) * seamlessness;
      }
      case LayerVoteType.ExplicitExact: {
        const divider = getFrameRateDivider(refreshRate.fps, vote.fps);
        if (this.supportsFrameRateOverrideValue) {
          // The app can be throttled to its rate by a frame rate override.
          return divider > 0 ? 1 : 0;
        }
        return divider === 1 ? 1 : 0;
      }
    }
  }

  // Per-app frame rates for apps whose layers all ask for the same rate, one
  // the display rate is a multiple of. The app is throttled to that rate.
  getFrameRateOverrides(
    layers: ReadonlyArray<LayerRequirement>,
    displayFrameRate: Fps,
    touch: boolean,
  ): Map<number, Fps> {
    const overrides = new Map<number, Fps>();
    if (touch) return overrides;

    const ratesByUid = new Map<number, Fps[]>();
    for (const layer of layers) {
      if (!isExplicitVote(layer.vote)) continue;
      const rates = ratesByUid.get(layer.ownerUid) ?? [];
      rates.push(layer.vote.fps);
      ratesByUid.set(layer.ownerUid, rates);
    }

    for (const [uid, rates] of ratesByUid) {
      const [first, ...rest] = rates;
      if (!rest.every((fps) => fps.equalsWithMargin(first))) continue;
      if (getFrameRateDivider(displayFrameRate, first) === 0) continue;
      overrides.set(uid, first);
    }
    return overrides;
  }

  getIdleTimerAction(): KernelIdleTimerAction {
    const deviceMin = this.minSupportedRefreshRate;
    const minByPolicy = this.getMinRefreshRateByPolicy();
    const maxByPolicy = this.getMaxRefreshRateByPolicy();

    // The kernel idle timer drops to the device min: keep it off if the
    // policy doesn't go that low.
    if (deviceMin.fps.lessThanWithMargin(minByPolicy.fps)) {
      return KernelIdleTimerAction.TurnOff;
    }
    if (minByPolicy === maxByPolicy) {
      // Already at the device min, there is nothing for the timer to do.
      return KernelIdleTimerAction.NoChange;
    }
    return KernelIdleTimerAction.TurnOn;
  }

  // The rate the display will run at once the kernel idle timer fires or is
  // reset, or undefined if that can't change anything.
  onKernelTimerChanged(
    desiredActiveConfigId: DisplayModeId | undefined,
    timerExpired: boolean,
  ): Fps | undefined {
    const current =
      desiredActiveConfigId === undefined
        ? this.currentRefreshRate
        : this.getRefreshRateFromConfigId(desiredActiveConfigId);
    const min = this.minSupportedRefreshRate;
    if (current === min) return undefined;
    return timerExpired ? min.fps : current.fps;
  }

  findClosestKnownFrameRate(frameRate: Fps): Fps {
    const rates = this.knownFrameRates;
    const lowest = rates[0];
    const highest = rates[rates.length - 1];
    if (frameRate.lessThanOrEqualWithMargin(lowest)) return lowest;
    if (frameRate.greaterThanOrEqualWithMargin(highest)) return highest;

    // First known rate that is not below |frameRate|. Exists since
    // |frameRate| is below the highest.
    const upper = rates.findIndex((fps) => fps.value >= frameRate.value);
    const above = rates[upper];
    const below = rates[upper - 1];
    const distanceAbove = Math.abs(frameRate.value - above.value);
    const distanceBelow = Math.abs(frameRate.value - below.value);
    return distanceAbove < distanceBelow ? above : below;
  }

  getKnownFrameRates(): ReadonlyArray<Fps> {
    return this.knownFrameRates;
  }

  // How many vsyncs of the current rate make one frame at |frameRate|, or 0
  // if it doesn't divide the current rate.
  getRefreshRateDivider(frameRate: Fps): number {
    return getFrameRateDivider(this.currentRefreshRate.fps, frameRate);
  }

  dump(): string {
    let result =
      'DesiredDisplayConfigSpecs (DisplayManager): ' +
      `${policyToString(this.displayManagerPolicy)}\n`;
    const currentPolicy = this.getCurrentPolicy();
    if (
      this.overridePolicy !== undefined &&
      !policyEquals(currentPolicy, this.displayManagerPolicy)
    ) {
      result +=
        'DesiredDisplayConfigSpecs (Override): ' +
        `${policyToString(currentPolicy)}\n\n`;
    }
    result += `Current config: ${this.currentRefreshRate}\n`;
    result += 'Refresh rates:\n';
    for (const refreshRate of this.refreshRates.values()) {
      result += `${refreshRate}\n`;
    }
    result +=
      'Supports Frame Rate Override: ' +
      `${this.supportsFrameRateOverrideValue ? 'yes' : 'no'}\n`;
    return result;
  }

  private isPolicyValid(policy: Policy): boolean {
    const refreshRate = this.refreshRates.get(policy.defaultConfig);
    if (refreshRate === undefined) {
      console.warn(
        `RefreshRateConfigs: default config ${policy.defaultConfig} not found`,
      );
      return false;
    }
    const {primaryRange, appRequestRange} = policy;
    if (!refreshRate.inPolicy(primaryRange.min, primaryRange.max)) {
      console.warn(
        'RefreshRateConfigs: default config is not in the primary range',
      );
      return false;
    }
    return (
      appRequestRange.min.lessThanOrEqualWithMargin(primaryRange.min) &&
      appRequestRange.max.greaterThanOrEqualWithMargin(primaryRange.max)
    );
  }

  private constructAvailableRefreshRates() {
    const policy = this.getCurrentPolicy();
    const defaultConfig = this.getRefreshRateFromConfigId(
      policy.defaultConfig,
    );
    const filterRefreshRates = (range: FpsRange, listName: string) => {
      const refreshRates = this.getSortedRefreshRateList(
        (refreshRate) =>
          (policy.allowGroupSwitching ||
            refreshRate.configGroup === defaultConfig.configGroup) &&
          refreshRate.inPolicy(range.min, range.max),
      );
      if (refreshRates.length === 0) {
        fail(
          `No matching configs for ${listName} range: ` +
            `min=${range.min} max=${range.max}`,
        );
      }
      return refreshRates;
    };
    this.primaryRefreshRates = filterRefreshRates(
      policy.primaryRange,
      'primary',
    );
    this.appRequestRefreshRates = filterRefreshRates(
      policy.appRequestRange,
      'app request',
    );
  }

  // Ascending fps; among equal periods, higher config group first.
  private getSortedRefreshRateList(
    shouldAdd: (refreshRate: RefreshRate) => boolean,
  ): RefreshRate[] {
    const refreshRates = [...this.refreshRates.values()].filter(shouldAdd);
    refreshRates.sort((a, b) => {
      if (a.vsyncPeriod !== b.vsyncPeriod) {
        return a.vsyncPeriod > b.vsyncPeriod ? -1 : 1;
      }
      return b.configGroup - a.configGroup;
    });
    return refreshRates;
  }
}

// Whole display frames needed for one layer frame, and what is left over.
// A remainder within the margin of zero or of a full period rounds up.
export function getDisplayFrames(
  layerPeriod: duration,
  displayPeriod: duration,
): {quotient: bigint; remainder: bigint} {
  let quotient = layerPeriod / displayPeriod;
  let remainder = layerPeriod % displayPeriod;
  if (
    remainder <= MARGIN_FOR_PERIOD_CALCULATION ||
    Duration.abs(remainder - displayPeriod) <= MARGIN_FOR_PERIOD_CALCULATION
  ) {
    quotient++;
    remainder = 0n;
  }
  return {quotient, remainder};
}

// First entry whose score beats every earlier one by more than the epsilon.
function getBestScore(scores: ReadonlyArray<Score>): RefreshRate {
  let best = scores[0];
  for (const entry of scores) {
    if (entry.score > best.score * (1 + SCORE_EPSILON)) {
      best = entry;
    }
  }
  return best.refreshRate;
}

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
import {duration} from '../base/time';

export type DisplayModeId = number;

// A hardware display configuration.
export interface DisplayMode {
  id: DisplayModeId;
  vsyncPeriod: duration;
  // Switching between modes of the same group is seamless.
  group: number;
}

export class RefreshRate {
  readonly fps: Fps;

  constructor(private readonly mode: DisplayMode) {
    this.fps = Fps.fromPeriod(mode.vsyncPeriod);
  }

  get configId(): DisplayModeId {
    return this.mode.id;
  }

  get vsyncPeriod(): duration {
    return this.mode.vsyncPeriod;
  }

  get configGroup(): number {
    return this.mode.group;
  }

  inPolicy(min: Fps, max: Fps): boolean {
    return (
      min.lessThanOrEqualWithMargin(this.fps) &&
      this.fps.lessThanOrEqualWithMargin(max)
    );
  }

  toString(): string {
    return (
      `{id=${this.configId}, fps=${this.fps.value.toFixed(2)}, ` +
      `group=${this.configGroup}}`
    );
  }
}

export interface FpsRange {
  min: Fps;
  max: Fps;
}

export const UNBOUNDED_FPS_RANGE: Readonly<FpsRange> = {
  min: Fps.INVALID,
  max: Fps.fromValue(Number.MAX_VALUE),
};

export function fpsRangeEquals(a: FpsRange, b: FpsRange): boolean {
  return a.min.equalsWithMargin(b.min) && a.max.equalsWithMargin(b.max);
}

export function fpsRangeToString(range: FpsRange): string {
  return `[${range.min} ${range.max}]`;
}

export interface Policy {
  defaultConfig: DisplayModeId;
  allowGroupSwitching: boolean;
  // Rates the display may pick from on its own.
  primaryRange: FpsRange;
  // Rates the display may switch to when layers explicitly ask for them.
  // Always contains the primary range.
  appRequestRange: FpsRange;
}

export function makePolicy(
  defaultConfig: DisplayModeId,
  primaryRange: FpsRange,
  appRequestRange: FpsRange = primaryRange,
  allowGroupSwitching = false,
): Policy {
  return {defaultConfig, allowGroupSwitching, primaryRange, appRequestRange};
}

export function policyEquals(a: Policy, b: Policy): boolean {
  return (
    a.defaultConfig === b.defaultConfig &&
    a.allowGroupSwitching === b.allowGroupSwitching &&
    fpsRangeEquals(a.primaryRange, b.primaryRange) &&
    fpsRangeEquals(a.appRequestRange, b.appRequestRange)
  );
}

export function policyToString(policy: Policy): string {
  return (
    `default config ID: ${policy.defaultConfig}, ` +
    `allowGroupSwitching = ${policy.allowGroupSwitching}, ` +
    `primary range: ${fpsRangeToString(policy.primaryRange)}, ` +
    `app request range: ${fpsRangeToString(policy.appRequestRange)}`
  );
}

export enum PolicyStatus {
  Updated = 'Updated',
  Unchanged = 'Unchanged',
  Rejected = 'Rejected',
}

export enum LayerVoteType {
  // Doesn't care about the refresh rate.
  NoVote = 'NoVote',
  // Minimal refresh rate available.
  Min = 'Min',
  // Maximal refresh rate available.
  Max = 'Max',
  // Rate calculated from the layer's present history.
  Heuristic = 'Heuristic',
  // Rate requested by the app: render at least this fast.
  ExplicitDefault = 'ExplicitDefault',
  // Rate requested by the app for content at a fixed cadence (e.g. video);
  // multiples of it are fine.
  ExplicitExactOrMultiple = 'ExplicitExactOrMultiple',
  // Rate requested by the app that must be matched exactly.
  ExplicitExact = 'ExplicitExact',
}

export type ExplicitVoteType =
  | LayerVoteType.ExplicitDefault
  | LayerVoteType.ExplicitExactOrMultiple
  | LayerVoteType.ExplicitExact;

export type ExplicitLayerVote = {type: ExplicitVoteType; fps: Fps};

export type LayerVote =
  | {type: LayerVoteType.NoVote | LayerVoteType.Min | LayerVoteType.Max}
  | {type: LayerVoteType.Heuristic; fps: Fps}
  | ExplicitLayerVote;

export enum Seamlessness {
  // Stays within the default config's group, or within the current group
  // while a focused layer allows seamed switches.
  Default = 'Default',
  // Only switches that don't interrupt the displayed content.
  OnlySeamless = 'OnlySeamless',
  // Either kind of switch.
  SeamedAndSeamless = 'SeamedAndSeamless',
}

export interface LayerRequirement {
  name: string;
  ownerUid: number;
  vote: LayerVote;
  seamlessness: Seamlessness;
  // In [0, 1].
  weight: number;
  focused: boolean;
}

export interface GlobalSignals {
  touch: boolean;
  idle: boolean;
}

export enum KernelIdleTimerAction {
  NoChange = 'NoChange',
  TurnOff = 'TurnOff',
  TurnOn = 'TurnOn',
}

export function isExplicitVote(vote: LayerVote): vote is ExplicitLayerVote {
  return (
    vote.type === LayerVoteType.ExplicitDefault ||
    vote.type === LayerVoteType.ExplicitExactOrMultiple ||
    vote.type === LayerVoteType.ExplicitExact
  );
}

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
import {assertTrue} from '../base/logging';
import {Brand, Duration, duration, Time, time} from '../base/time';
import {JankMask} from './jank_type';

export type Token = number;

// Used by producers that did not request a token for their frame.
export const INVALID_TOKEN: Token = -1;

// Start, end and present time of a unit of work. Fields that are not known
// yet are Time.ZERO. When all are set, start <= end <= present.
export interface TimelineItem {
  startTime: time;
  endTime: time;
  presentTime: time;
}

export function emptyTimelineItem(): TimelineItem {
  return {startTime: Time.ZERO, endTime: Time.ZERO, presentTime: Time.ZERO};
}

export enum PredictionState {
  // Predictions obtained successfully from the TokenManager.
  Valid = 'Valid',
  // A token was given but it aged out of the TokenManager.
  Expired = 'Expired',
  // No token was requested.
  None = 'None',
}

export enum PresentState {
  Presented = 'Presented',
  Dropped = 'Dropped',
  Unknown = 'Unknown',
}

export enum FramePresentMetadata {
  OnTimePresent = 'On Time Present',
  LatePresent = 'Late Present',
  EarlyPresent = 'Early Present',
  UnknownPresent = 'Unknown Present',
}

export enum FrameReadyMetadata {
  OnTimeFinish = 'On Time Finish',
  LateFinish = 'Late Finish',
  UnknownFinish = 'Unknown Finish',
}

export enum FrameStartMetadata {
  OnTimeStart = 'On Time Start',
  LateStart = 'Late Start',
  EarlyStart = 'Early Start',
  UnknownStart = 'Unknown Start',
}

// If an actual timestamp falls within the threshold of its prediction, it is
// treated as on time.
export interface JankClassificationThresholds {
  presentThreshold: duration;
  deadlineThreshold: duration;
  startThreshold: duration;
}

export const DEFAULT_JANK_THRESHOLDS: Readonly<JankClassificationThresholds> =
  {
    presentThreshold: Duration.fromMillis(2),
    deadlineThreshold: Duration.fromMillis(2),
    startThreshold: Duration.fromMillis(2),
  };

// Identifies the frame a producer is working on.
export interface FrameTimelineInfo {
  token: Token;
  inputEventId?: number;
}

// A surface frame owned by the FrameTimeline, addressed by handle.
export type SurfaceFrameHandle = Brand<number, 'SurfaceFrameHandle'>;

export const SurfaceFrameHandle = {
  fromRaw(v: number): SurfaceFrameHandle {
    return v as SurfaceFrameHandle;
  },
};

// ----------------------------------------------------------------------------
// Metrics collaborator.

export interface JankyFramesInfo {
  refreshRate: Fps;
  // The rate the layer was scheduled to render at, if known.
  renderRate?: Fps;
  uid: number;
  layerName: string;
  jankType: JankMask;
  displayDeadlineDelta: duration;
  displayPresentDelta: duration;
  // -1 when the producer's predictions had expired.
  appDeadlineDelta: duration;
}

export interface TimeStats {
  incrementJankyFrames(info: JankyFramesInfo): void;
}

// ----------------------------------------------------------------------------
// Present fences handed over by the compositor.

export type FenceSignal =
  | {state: 'signaled'; signalTime: time}
  | {state: 'pending'}
  | {state: 'invalid'};

export interface PresentFence {
  getSignalTime(): FenceSignal;
}

// ----------------------------------------------------------------------------
// Trace sink. Events are semantic; encoding them is up to the sink.

export enum PresentType {
  OnTime = 'PRESENT_ON_TIME',
  Late = 'PRESENT_LATE',
  Early = 'PRESENT_EARLY',
  Dropped = 'PRESENT_DROPPED',
  Unspecified = 'PRESENT_UNSPECIFIED',
}

export type FrameTimelineEvent =
  | {
      kind: 'ExpectedDisplayFrameStart';
      ts: time;
      cookie: number;
      token: Token;
      pid: number;
    }
  | {
      kind: 'ActualDisplayFrameStart';
      ts: time;
      cookie: number;
      token: Token;
      pid: number;
      presentType: PresentType;
      onTimeFinish: boolean;
      gpuComposition: boolean;
      jankType: JankMask;
    }
  | {
      kind: 'ExpectedSurfaceFrameStart';
      ts: time;
      cookie: number;
      token: Token;
      displayFrameToken: Token;
      pid: number;
      layerName: string;
    }
  | {
      kind: 'ActualSurfaceFrameStart';
      ts: time;
      cookie: number;
      token: Token;
      displayFrameToken: Token;
      pid: number;
      layerName: string;
      presentType: PresentType;
      onTimeFinish: boolean;
      gpuComposition: boolean;
      jankType: JankMask;
    }
  | {kind: 'FrameEnd'; ts: time; cookie: number};

export interface FrameTimelineSink {
  emit(event: FrameTimelineEvent): void;
}

// Pairs the start and end events of one timeline slice.
export class TraceCookieCounter {
  private traceCookie = 0;

  getCookieForTracing(): number {
    return ++this.traceCookie;
  }
}

export function toPresentType(metadata: FramePresentMetadata): PresentType {
  switch (metadata) {
    case FramePresentMetadata.EarlyPresent:
      return PresentType.Early;
    case FramePresentMetadata.LatePresent:
      return PresentType.Late;
    case FramePresentMetadata.OnTimePresent:
      return PresentType.OnTime;
    case FramePresentMetadata.UnknownPresent:
      return PresentType.Unspecified;
  }
}

// Whether |deltaToVsync| is within |threshold| of a vsync boundary on either
// side. E.g. with a 2ms threshold and an 11ms period, 0-2ms and 9-11ms are
// both boundaries.
export function isFactorOfVsync(
  deltaToVsync: duration,
  period: duration,
  threshold: duration,
): boolean {
  // With a threshold of half a period or more the two bands overlap and every
  // delta would count as a vsync factor.
  assertTrue(
    threshold * 2n < period,
    `Present threshold ${threshold}ns too large for vsync period ${period}ns`,
  );
  return deltaToVsync < threshold || deltaToVsync >= period - threshold;
}

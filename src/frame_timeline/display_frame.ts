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
import {Duration, duration, Time, time} from '../base/time';
import {dumpTable, getMinTime} from './dump';
import {isJanky, JankMask, jankMaskToString, JankType} from './jank_type';
import {FrameContext, SurfaceFrame} from './surface_frame';
import {
  emptyTimelineItem,
  FramePresentMetadata,
  FrameReadyMetadata,
  FrameStartMetadata,
  FrameTimelineSink,
  INVALID_TOKEN,
  isFactorOfVsync,
  PredictionState,
  SurfaceFrameHandle,
  TimelineItem,
  Token,
  toPresentType,
} from './types';

export type SurfaceFrameResolver = (
  handle: SurfaceFrameHandle,
) => SurfaceFrame | undefined;

// Deltas reported to the surface frames when the compositor's own
// predictions expired.
const UNKNOWN_DELTA: duration = -1n;

/**
 * One composition pass of the compositor: from its wake-up to the moment the
 * display presented the result. It owns the ordered list of surface frames
 * latched into it, which it addresses by handle.
 */
export class DisplayFrame {
  private _token: Token = INVALID_TOKEN;
  private _refreshRate = Fps.INVALID;
  private _predictionState = PredictionState.None;
  private predictions = emptyTimelineItem();
  private readonly actuals = emptyTimelineItem();
  private gpuComposition = false;
  private _jankType: JankMask = JankType.None;
  private _framePresentMetadata = FramePresentMetadata.UnknownPresent;
  private _frameReadyMetadata = FrameReadyMetadata.UnknownFinish;
  private _frameStartMetadata = FrameStartMetadata.UnknownStart;
  private readonly surfaceFrames: SurfaceFrameHandle[] = [];

  constructor(private readonly context: FrameContext) {}

  get token(): Token {
    return this._token;
  }

  get refreshRate(): Fps {
    return this._refreshRate;
  }

  get predictionState(): PredictionState {
    return this._predictionState;
  }

  get jankType(): JankMask {
    return this._jankType;
  }

  get framePresentMetadata(): FramePresentMetadata {
    return this._framePresentMetadata;
  }

  get frameReadyMetadata(): FrameReadyMetadata {
    return this._frameReadyMetadata;
  }

  get frameStartMetadata(): FrameStartMetadata {
    return this._frameStartMetadata;
  }

  get children(): ReadonlyArray<SurfaceFrameHandle> {
    return this.surfaceFrames;
  }

  getActuals(): TimelineItem {
    return {...this.actuals};
  }

  getPredictions(): TimelineItem {
    return {...this.predictions};
  }

  addSurfaceFrame(handle: SurfaceFrameHandle) {
    this.surfaceFrames.push(handle);
  }

  onSfWakeUp(
    token: Token,
    refreshRate: Fps,
    predictions: TimelineItem | undefined,
    wakeUpTime: time,
  ) {
    assertTrue(refreshRate.isValid(), `Invalid refresh rate ${refreshRate}`);
    this._token = token;
    this._refreshRate = refreshRate;
    if (predictions === undefined) {
      this._predictionState = PredictionState.Expired;
    } else {
      this._predictionState = PredictionState.Valid;
      this.predictions = {...predictions};
    }
    this.actuals.startTime = wakeUpTime;
  }

  setActualStartTime(actualStartTime: time) {
    this.actuals.startTime = actualStartTime;
  }

  setActualEndTime(actualEndTime: time) {
    this.actuals.endTime = actualEndTime;
  }

  setGpuComposition(gpuComposition: boolean) {
    this.gpuComposition = gpuComposition;
  }

  onPresent(signalTime: time, resolve: SurfaceFrameResolver) {
    this.actuals.presentTime = signalTime;
    const {deadlineDelta, deltaToVsync} = this.classify();
    for (const handle of this.surfaceFrames) {
      resolve(handle)?.onPresent(
        signalTime,
        this._jankType,
        this._refreshRate,
        deadlineDelta,
        deltaToVsync,
      );
    }
  }

  private classify(): {deadlineDelta: duration; deltaToVsync: duration} {
    if (this._predictionState === PredictionState.None) {
      // Never armed with a wake-up: nothing to compare against.
      return {deadlineDelta: 0n, deltaToVsync: 0n};
    }
    if (this._predictionState === PredictionState.Expired) {
      this._jankType = JankType.Unknown;
      this._framePresentMetadata = FramePresentMetadata.UnknownPresent;
      this._frameReadyMetadata = FrameReadyMetadata.UnknownFinish;
      return {deadlineDelta: UNKNOWN_DELTA, deltaToVsync: UNKNOWN_DELTA};
    }

    const {presentThreshold, deadlineThreshold, startThreshold} =
      this.context.thresholds;
    const period = this._refreshRate.period;
    const presentDelta = Time.diff(
      this.actuals.presentTime,
      this.predictions.presentTime,
    );
    const deadlineDelta = Time.diff(
      this.actuals.endTime,
      this.predictions.endTime,
    );
    const startDelta = Time.diff(
      this.actuals.startTime,
      this.predictions.startTime,
    );
    // How far off the present was, modulo whole vsyncs.
    const deltaToVsync = Duration.abs(presentDelta) % period;

    if (Duration.abs(presentDelta) > presentThreshold) {
      this._framePresentMetadata =
        presentDelta > 0n
          ? FramePresentMetadata.LatePresent
          : FramePresentMetadata.EarlyPresent;
    } else {
      this._framePresentMetadata = FramePresentMetadata.OnTimePresent;
    }

    this._frameReadyMetadata =
      deadlineDelta > deadlineThreshold
        ? FrameReadyMetadata.LateFinish
        : FrameReadyMetadata.OnTimeFinish;

    if (Duration.abs(startDelta) > startThreshold) {
      this._frameStartMetadata =
        startDelta > 0n
          ? FrameStartMetadata.LateStart
          : FrameStartMetadata.EarlyStart;
    } else {
      this._frameStartMetadata = FrameStartMetadata.OnTimeStart;
    }

    const onVsync = isFactorOfVsync(deltaToVsync, period, presentThreshold);
    switch (this._framePresentMetadata) {
      case FramePresentMetadata.OnTimePresent:
        this._jankType = JankType.None;
        break;
      case FramePresentMetadata.EarlyPresent:
        if (this._frameReadyMetadata === FrameReadyMetadata.OnTimeFinish) {
          this._jankType = onVsync
            ? JankType.CompositorScheduling
            : JankType.PredictionError;
        } else {
          // Finished late but still presented early: the compositor woke up
          // too early.
          this._jankType = JankType.CompositorScheduling;
        }
        break;
      case FramePresentMetadata.LatePresent:
        if (this._frameReadyMetadata === FrameReadyMetadata.OnTimeFinish) {
          this._jankType = onVsync
            ? JankType.DisplayDriverLate
            : JankType.PredictionError;
        } else {
          this._jankType = JankType.CompositorCpuDeadlineMissed;
        }
        break;
    }
    return {deadlineDelta, deltaToVsync};
  }

  trace(
    compositorPid: number,
    sink: FrameTimelineSink,
    resolve: SurfaceFrameResolver,
  ) {
    if (this._token === INVALID_TOKEN) {
      console.debug(
        'FrameTimeline: cannot trace DisplayFrame with invalid token',
      );
      return;
    }
    const {cookieCounter} = this.context;

    const expectedCookie = cookieCounter.getCookieForTracing();
    sink.emit({
      kind: 'ExpectedDisplayFrameStart',
      ts: this.predictions.startTime,
      cookie: expectedCookie,
      token: this._token,
      pid: compositorPid,
    });
    sink.emit({
      kind: 'FrameEnd',
      ts: this.predictions.endTime,
      cookie: expectedCookie,
    });

    const actualCookie = cookieCounter.getCookieForTracing();
    sink.emit({
      kind: 'ActualDisplayFrameStart',
      ts: this.actuals.startTime,
      cookie: actualCookie,
      token: this._token,
      pid: compositorPid,
      presentType: toPresentType(this._framePresentMetadata),
      onTimeFinish:
        this._frameReadyMetadata === FrameReadyMetadata.OnTimeFinish,
      gpuComposition: this.gpuComposition,
      jankType: this._jankType,
    });
    sink.emit({
      kind: 'FrameEnd',
      ts: this.actuals.endTime,
      cookie: actualCookie,
    });

    for (const handle of this.surfaceFrames) {
      resolve(handle)?.trace(this._token, sink);
    }
  }

  getBaseTime(resolve: SurfaceFrameResolver): time | undefined {
    let baseTime = getMinTime(
      this._predictionState,
      this.predictions,
      this.actuals,
    );
    for (const handle of this.surfaceFrames) {
      const surfaceBaseTime = resolve(handle)?.getBaseTime();
      if (surfaceBaseTime === undefined) continue;
      baseTime =
        baseTime === undefined
          ? surfaceBaseTime
          : Time.min(baseTime, surfaceBaseTime);
    }
    return baseTime;
  }

  // Whether this frame or any of its presented surface frames is janky.
  isJanky(resolve: SurfaceFrameResolver): boolean {
    if (isJanky(this._jankType)) return true;
    return this.surfaceFrames.some((handle) => {
      const jankType = resolve(handle)?.jankType;
      return jankType !== undefined && isJanky(jankType);
    });
  }

  dump(baseTime: time, resolve: SurfaceFrameResolver): string {
    const presentDelta = Duration.abs(
      Time.diff(this.actuals.presentTime, this.predictions.presentTime),
    );
    const period = this._refreshRate.period;
    const deltaToVsync = period > 0n ? presentDelta % period : 0n;
    const lines = [
      `Prediction State : ${this._predictionState}`,
      `Jank Type : ${jankMaskToString(this._jankType)}`,
      `Present Metadata : ${this._framePresentMetadata}`,
      `Finish Metadata: ${this._frameReadyMetadata}`,
      `Start Metadata: ${this._frameStartMetadata}`,
      `Vsync Period: ${Duration.formatMillis(period, 6)}`,
      `Present delta: ${Duration.formatMillis(presentDelta, 6)}`,
      `Present delta % refreshrate: ${Duration.formatMillis(deltaToVsync, 6)}`,
    ];
    let result = isJanky(this._jankType) ? ' [*]\n' : '\n';
    result += lines.map((line) => `${line}\n`).join('');
    result += dumpTable(
      this.predictions,
      this.actuals,
      '',
      this._predictionState,
      baseTime,
    );
    result += '\n';
    const indent = '    ';
    for (const handle of this.surfaceFrames) {
      const surfaceFrame = resolve(handle);
      if (surfaceFrame !== undefined) {
        result += surfaceFrame.dump(indent, baseTime);
      }
    }
    result += '\n';
    return result;
  }
}

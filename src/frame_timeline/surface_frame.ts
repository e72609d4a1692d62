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
import {fail} from '../base/logging';
import {Duration, duration, Time, time} from '../base/time';
import {dumpTable, getMinTime} from './dump';
import {isJanky, JankMask, jankMaskToString, JankType} from './jank_type';
import {
  emptyTimelineItem,
  FramePresentMetadata,
  FrameReadyMetadata,
  FrameTimelineInfo,
  FrameTimelineSink,
  INVALID_TOKEN,
  isFactorOfVsync,
  JankClassificationThresholds,
  PredictionState,
  PresentState,
  PresentType,
  TimelineItem,
  TimeStats,
  Token,
  toPresentType,
  TraceCookieCounter,
} from './types';

// Collaborators shared by every frame of a FrameTimeline.
export interface FrameContext {
  readonly timeStats: TimeStats;
  readonly thresholds: JankClassificationThresholds;
  readonly cookieCounter: TraceCookieCounter;
}

export interface SurfaceFrameArgs {
  info: FrameTimelineInfo;
  ownerPid: number;
  ownerUid: number;
  layerName: string;
  debugName: string;
  predictionState: PredictionState;
  predictions: TimelineItem;
}

// Reported as the producer's deadline delta when its predictions expired.
const EXPIRED_DEADLINE_DELTA: duration = -1n;

/**
 * Timing of one buffer produced by one layer. Timestamps arrive piecemeal
 * (queue, acquire fence, latch/drop) while the frame travels through the
 * compositor; once the display frame it was latched into is presented, the
 * frame is classified.
 */
export class SurfaceFrame {
  readonly token: Token;
  readonly inputEventId?: number;
  readonly ownerPid: number;
  readonly ownerUid: number;
  readonly layerName: string;
  readonly debugName: string;
  readonly predictionState: PredictionState;

  private readonly predictions: TimelineItem;
  private readonly actuals = emptyTimelineItem();
  private actualQueueTime = Time.ZERO;
  private _presentState = PresentState.Unknown;
  private lastLatchTime = Time.ZERO;
  private renderRate?: Fps;
  private gpuComposition = false;
  private _jankType: JankMask = JankType.None;
  private _framePresentMetadata = FramePresentMetadata.UnknownPresent;
  private _frameReadyMetadata = FrameReadyMetadata.UnknownFinish;

  constructor(
    args: SurfaceFrameArgs,
    private readonly context: FrameContext,
  ) {
    this.token = args.info.token;
    this.inputEventId = args.info.inputEventId;
    this.ownerPid = args.ownerPid;
    this.ownerUid = args.ownerUid;
    this.layerName = args.layerName;
    this.debugName = args.debugName;
    this.predictionState = args.predictionState;
    this.predictions = {...args.predictions};
  }

  setActualStartTime(actualStartTime: time) {
    this.actuals.startTime = actualStartTime;
  }

  setActualQueueTime(actualQueueTime: time) {
    this.actualQueueTime = actualQueueTime;
  }

  // The buffer is only ready once it is both queued and its acquire fence
  // has signalled.
  setAcquireFenceTime(acquireFenceTime: time) {
    this.actuals.endTime = Time.max(acquireFenceTime, this.actualQueueTime);
  }

  setPresentState(presentState: PresentState, lastLatchTime = Time.ZERO) {
    if (this._presentState !== PresentState.Unknown) {
      fail(
        `setPresentState called on a SurfaceFrame from Layer - ` +
          `${this.debugName}, that has a PresentState - ` +
          `${this._presentState} set already.`,
      );
    }
    this._presentState = presentState;
    this.lastLatchTime = lastLatchTime;
  }

  setRenderRate(renderRate: Fps) {
    this.renderRate = renderRate;
  }

  setGpuComposition(gpuComposition: boolean) {
    this.gpuComposition = gpuComposition;
  }

  get presentState(): PresentState {
    return this._presentState;
  }

  get framePresentMetadata(): FramePresentMetadata {
    return this._framePresentMetadata;
  }

  get frameReadyMetadata(): FrameReadyMetadata {
    return this._frameReadyMetadata;
  }

  // Undefined until the frame has been presented.
  get jankType(): JankMask | undefined {
    if (!Time.isSet(this.actuals.presentTime)) {
      return undefined;
    }
    return this._jankType;
  }

  getActuals(): TimelineItem {
    return {...this.actuals};
  }

  getPredictions(): TimelineItem {
    return {...this.predictions};
  }

  getBaseTime(): time | undefined {
    return getMinTime(this.predictionState, this.predictions, this.actuals);
  }

  onPresent(
    presentTime: time,
    displayFrameJankType: JankMask,
    refreshRate: Fps,
    displayDeadlineDelta: duration,
    displayPresentDelta: duration,
  ) {
    if (this._presentState !== PresentState.Presented) {
      // Dropped buffers are not classified.
      return;
    }

    this.actuals.presentTime = presentTime;
    if (this.predictionState === PredictionState.None) {
      // Without a token there is no deadline to compare against.
      return;
    }
    if (this.predictionState === PredictionState.Expired) {
      // Could be a missed deadline, could be a producer that asked for its
      // token a long time ago. There is no way to tell.
      this._jankType = JankType.Unknown;
      this._framePresentMetadata = FramePresentMetadata.UnknownPresent;
      this._frameReadyMetadata = FrameReadyMetadata.UnknownFinish;
      this.reportJank(
        refreshRate,
        displayDeadlineDelta,
        displayPresentDelta,
        EXPIRED_DEADLINE_DELTA,
      );
      return;
    }

    const {presentThreshold, deadlineThreshold} = this.context.thresholds;
    const period = refreshRate.period;
    const presentDelta = Time.diff(
      this.actuals.presentTime,
      this.predictions.presentTime,
    );
    const deadlineDelta = Time.diff(
      this.actuals.endTime,
      this.predictions.endTime,
    );
    // A display frame that was never armed carries no refresh rate.
    const absPresentDelta = Duration.abs(presentDelta);
    const deltaToVsync =
      period > 0n ? absPresentDelta % period : absPresentDelta;

    this._frameReadyMetadata =
      deadlineDelta > deadlineThreshold
        ? FrameReadyMetadata.LateFinish
        : FrameReadyMetadata.OnTimeFinish;

    if (Duration.abs(presentDelta) > presentThreshold) {
      this._framePresentMetadata =
        presentDelta > 0n
          ? FramePresentMetadata.LatePresent
          : FramePresentMetadata.EarlyPresent;
    } else {
      this._framePresentMetadata = FramePresentMetadata.OnTimePresent;
    }

    const vsyncJank = () =>
      refreshRate.isValid() &&
      isFactorOfVsync(deltaToVsync, period, presentThreshold)
        ? JankType.CompositorScheduling
        : JankType.PredictionError;

    if (this._framePresentMetadata === FramePresentMetadata.OnTimePresent) {
      this._jankType = JankType.None;
    } else if (
      this._framePresentMetadata === FramePresentMetadata.EarlyPresent
    ) {
      if (this._frameReadyMetadata === FrameReadyMetadata.OnTimeFinish) {
        this._jankType = vsyncJank();
      } else {
        this._jankType = JankType.Unknown;
      }
    } else {
      if (
        Time.isSet(this.lastLatchTime) &&
        this.predictions.endTime <= this.lastLatchTime
      ) {
        this._jankType |= JankType.BufferStuffing;
      }
      if (this._frameReadyMetadata === FrameReadyMetadata.OnTimeFinish) {
        // The producer was on time: blame the display frame if it was late,
        // otherwise the schedule.
        this._jankType |= isJanky(displayFrameJankType)
          ? displayFrameJankType
          : vsyncJank();
      } else {
        this._jankType |= isJanky(displayFrameJankType)
          ? displayFrameJankType
          : JankType.ProducerDeadlineMissed;
      }
    }

    this.reportJank(
      refreshRate,
      displayDeadlineDelta,
      displayPresentDelta,
      deadlineDelta,
    );
  }

  private reportJank(
    refreshRate: Fps,
    displayDeadlineDelta: duration,
    displayPresentDelta: duration,
    appDeadlineDelta: duration,
  ) {
    this.context.timeStats.incrementJankyFrames({
      refreshRate,
      renderRate: this.renderRate,
      uid: this.ownerUid,
      layerName: this.layerName,
      jankType: this._jankType,
      displayDeadlineDelta,
      displayPresentDelta,
      appDeadlineDelta,
    });
  }

  trace(displayFrameToken: Token, sink: FrameTimelineSink) {
    if (this.token === INVALID_TOKEN) {
      console.debug(
        `FrameTimeline: cannot trace SurfaceFrame - ${this.layerName} ` +
          `with invalid token`,
      );
      return;
    }
    if (displayFrameToken === INVALID_TOKEN) {
      console.debug(
        `FrameTimeline: cannot trace SurfaceFrame - ${this.layerName} ` +
          `with invalid displayFrameToken`,
      );
      return;
    }

    const expectedCookie = this.context.cookieCounter.getCookieForTracing();
    sink.emit({
      kind: 'ExpectedSurfaceFrameStart',
      ts: this.predictions.startTime,
      cookie: expectedCookie,
      token: this.token,
      displayFrameToken,
      pid: this.ownerPid,
      layerName: this.debugName,
    });
    sink.emit({
      kind: 'FrameEnd',
      ts: this.predictions.endTime,
      cookie: expectedCookie,
    });

    const actualCookie = this.context.cookieCounter.getCookieForTracing();
    sink.emit({
      kind: 'ActualSurfaceFrameStart',
      // The actual start is not known, the expected start stands in for it.
      ts: this.predictions.startTime,
      cookie: actualCookie,
      token: this.token,
      displayFrameToken,
      pid: this.ownerPid,
      layerName: this.debugName,
      presentType: this.tracedPresentType(),
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
  }

  private tracedPresentType(): PresentType {
    switch (this._presentState) {
      case PresentState.Dropped:
        return PresentType.Dropped;
      case PresentState.Unknown:
        return PresentType.Unspecified;
      case PresentState.Presented:
        return toPresentType(this._framePresentMetadata);
    }
  }

  dump(indent: string, baseTime: time): string {
    const lines = [
      `Layer - ${this.debugName}${isJanky(this._jankType) ? ' [*]' : ''}`,
      `Token: ${this.token}`,
      `Owner Pid : ${this.ownerPid}`,
      `Scheduled rendering rate: ${this.renderRate?.intValue() ?? 0} fps`,
      `Present State : ${this._presentState}`,
      `Prediction State : ${this.predictionState}`,
      `Jank Type : ${jankMaskToString(this._jankType)}`,
      `Present Metadata : ${this._framePresentMetadata}`,
      `Finish Metadata: ${this._frameReadyMetadata}`,
      `Last latch time: ${Duration.formatMillis(
        Duration.max(0n, Time.diff(this.lastLatchTime, baseTime)),
        6,
      )}`,
    ];
    if (this.predictionState === PredictionState.Valid) {
      const presentDelta = Duration.abs(
        Time.diff(this.actuals.presentTime, this.predictions.presentTime),
      );
      lines.push(`Present delta: ${Duration.formatMillis(presentDelta, 6)}`);
    }
    let result = lines.map((line) => `${indent}${line}\n`).join('');
    result += dumpTable(
      this.predictions,
      this.actuals,
      indent,
      this.predictionState,
      baseTime,
    );
    return result;
  }
}

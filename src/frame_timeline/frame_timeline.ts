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
import {time, Time} from '../base/time';
import {FrameTimelineConfig, parseConfig} from '../config';
import {DisplayFrame} from './display_frame';
import {FrameContext, SurfaceFrame} from './surface_frame';
import {Clock, systemClock, TokenManager} from './token_manager';
import {
  emptyTimelineItem,
  FrameTimelineInfo,
  FrameTimelineSink,
  INVALID_TOKEN,
  PredictionState,
  PresentFence,
  PresentState,
  SurfaceFrameHandle,
  TimelineItem,
  TimeStats,
  Token,
  TraceCookieCounter,
} from './types';

export interface FrameTimelineArgs {
  timeStats: TimeStats;
  // Pid of the compositor, attached to the display frames it traces.
  pid: number;
  config?: Partial<FrameTimelineConfig>;
  clock?: Clock;
  sink?: FrameTimelineSink;
}

interface PendingPresentFence {
  fence: PresentFence;
  displayFrame: DisplayFrame;
}

/**
 * Ledger of frame timings. Owns the token manager, every surface frame
 * (handed out to producers as handles), the display frame being composed and
 * a bounded history of finished display frames.
 *
 * All methods run to completion synchronously. Present fences are polled:
 * a display frame is classified the first time its fence is seen signalled.
 */
export class FrameTimeline {
  private readonly tokenManager: TokenManager;
  private readonly context: FrameContext;
  private readonly defaultMaxDisplayFrames: number;
  private readonly pid: number;
  private readonly sink?: FrameTimelineSink;

  private readonly surfaceFrames = new Map<SurfaceFrameHandle, SurfaceFrame>();
  private nextHandle = 1;
  private currentDisplayFrame: DisplayFrame;
  private displayFrames: DisplayFrame[] = [];
  private pendingPresentFences: PendingPresentFence[] = [];
  private maxDisplayFrames: number;

  private readonly resolve = (handle: SurfaceFrameHandle) =>
    this.surfaceFrames.get(handle);

  constructor(args: FrameTimelineArgs) {
    const defaults = parseConfig().frameTimeline;
    const config = {...defaults, ...args.config};
    this.tokenManager = new TokenManager(
      args.clock ?? systemClock,
      config.tokenRetention,
    );
    this.context = {
      timeStats: args.timeStats,
      thresholds: config.thresholds,
      cookieCounter: new TraceCookieCounter(),
    };
    this.pid = args.pid;
    this.sink = args.sink;
    assertTrue(config.maxDisplayFrames > 0, 'maxDisplayFrames must be > 0');
    this.defaultMaxDisplayFrames = config.maxDisplayFrames;
    this.maxDisplayFrames = config.maxDisplayFrames;
    this.currentDisplayFrame = new DisplayFrame(this.context);
  }

  generateToken(predictions: TimelineItem): Token {
    return this.tokenManager.generateTokenForPredictions(predictions);
  }

  getPredictionsForToken(token: Token): TimelineItem | undefined {
    return this.tokenManager.getPredictionsForToken(token);
  }

  createSurfaceFrameForToken(
    info: FrameTimelineInfo,
    ownerPid: number,
    ownerUid: number,
    layerName: string,
    debugName: string,
  ): SurfaceFrameHandle {
    let predictionState = PredictionState.None;
    let predictions: TimelineItem | undefined;
    if (info.token !== INVALID_TOKEN) {
      predictions = this.tokenManager.getPredictionsForToken(info.token);
      predictionState =
        predictions === undefined
          ? PredictionState.Expired
          : PredictionState.Valid;
    }
    const surfaceFrame = new SurfaceFrame(
      {
        info,
        ownerPid,
        ownerUid,
        layerName,
        debugName,
        predictionState,
        predictions: predictions ?? emptyTimelineItem(),
      },
      this.context,
    );
    const handle = this.newHandle();
    this.surfaceFrames.set(handle, surfaceFrame);
    return handle;
  }

  getSurfaceFrame(handle: SurfaceFrameHandle): SurfaceFrame | undefined {
    return this.surfaceFrames.get(handle);
  }

  recordSurfaceQueued(handle: SurfaceFrameHandle, queueTime: time) {
    this.withSurfaceFrame(handle, 'recordSurfaceQueued', (surfaceFrame) =>
      surfaceFrame.setActualQueueTime(queueTime),
    );
  }

  recordSurfaceReady(handle: SurfaceFrameHandle, acquireFenceTime: time) {
    this.withSurfaceFrame(handle, 'recordSurfaceReady', (surfaceFrame) =>
      surfaceFrame.setAcquireFenceTime(acquireFenceTime),
    );
  }

  setPresentOutcome(
    handle: SurfaceFrameHandle,
    presentState: PresentState,
    lastLatchTime = Time.ZERO,
  ) {
    this.withSurfaceFrame(handle, 'setPresentOutcome', (surfaceFrame) =>
      surfaceFrame.setPresentState(presentState, lastLatchTime),
    );
  }

  setSurfaceRenderRate(handle: SurfaceFrameHandle, renderRate: Fps) {
    this.withSurfaceFrame(handle, 'setSurfaceRenderRate', (surfaceFrame) =>
      surfaceFrame.setRenderRate(renderRate),
    );
  }

  // Drops a surface frame that will never be latched, e.g. because its buffer
  // was discarded before reaching the compositor.
  releaseSurfaceFrame(handle: SurfaceFrameHandle) {
    this.withSurfaceFrame(handle, 'releaseSurfaceFrame', () => {
      this.surfaceFrames.delete(handle);
    });
  }

  // Latches the surface frame into the display frame being composed.
  addSurfaceFrame(handle: SurfaceFrameHandle) {
    this.withSurfaceFrame(handle, 'addSurfaceFrame', () =>
      this.currentDisplayFrame.addSurfaceFrame(handle),
    );
  }

  // The compositor woke up to compose the frame predicted under |token|.
  setSfWakeUp(token: Token, wakeUpTime: time, refreshRate: Fps) {
    this.currentDisplayFrame.onSfWakeUp(
      token,
      refreshRate,
      this.tokenManager.getPredictionsForToken(token),
      wakeUpTime,
    );
  }

  // The compositor handed the frame to the display at |presentTime|. Its
  // actual present time is only known once |fence| signals.
  setSfPresent(presentTime: time, fence: PresentFence, gpuComposition = false) {
    this.currentDisplayFrame.setActualEndTime(presentTime);
    this.currentDisplayFrame.setGpuComposition(gpuComposition);
    this.pendingPresentFences.push({
      fence,
      displayFrame: this.currentDisplayFrame,
    });
    this.flushPendingPresentFences();
    this.finalizeCurrentDisplayFrame();
  }

  flushPendingPresentFences() {
    while (this.pendingPresentFences.length > 0) {
      const {fence, displayFrame} = this.pendingPresentFences[0];
      const signal = fence.getSignalTime();
      if (signal.state === 'pending') {
        // Later fences wait behind this one so that frames are always
        // classified in present order.
        return;
      }
      this.pendingPresentFences.shift();
      if (signal.state === 'signaled') {
        displayFrame.onPresent(signal.signalTime, this.resolve);
        if (this.sink !== undefined) {
          displayFrame.trace(this.pid, this.sink, this.resolve);
        }
      }
    }
  }

  get pendingPresentFenceCount(): number {
    return this.pendingPresentFences.length;
  }

  getDisplayFrames(): ReadonlyArray<DisplayFrame> {
    return this.displayFrames;
  }

  get surfaceFrameCount(): number {
    return this.surfaceFrames.size;
  }

  // Resizing drops the whole history: frames from before and after the resize
  // are never mixed. Only the surface frames latched into the display frame
  // being composed survive.
  setMaxDisplayFrames(size: number) {
    assertTrue(
      Number.isInteger(size) && size > 0,
      `Invalid display frame history size: ${size}`,
    );
    const latched = new Set(this.currentDisplayFrame.children);
    for (const handle of this.surfaceFrames.keys()) {
      if (!latched.has(handle)) {
        this.surfaceFrames.delete(handle);
      }
    }
    this.displayFrames = [];
    this.pendingPresentFences = [];
    this.maxDisplayFrames = size;
  }

  reset() {
    this.setMaxDisplayFrames(this.defaultMaxDisplayFrames);
  }

  dumpAll(): string {
    let result = `Number of display frames : ${this.displayFrames.length}\n`;
    const baseTime = this.getBaseTime();
    this.displayFrames.forEach((displayFrame, i) => {
      result += `Display Frame ${i}`;
      result += displayFrame.dump(baseTime, this.resolve);
    });
    return result;
  }

  dumpJank(): string {
    let result = '';
    const baseTime = this.getBaseTime();
    this.displayFrames.forEach((displayFrame, i) => {
      if (!displayFrame.isJanky(this.resolve)) return;
      result += `Display Frame ${i}`;
      result += displayFrame.dump(baseTime, this.resolve);
    });
    return result;
  }

  // Dump entry point for command line style arguments: '-jank' and '-all'.
  parseArgs(args: ReadonlyArray<string>): string {
    const flags = new Set(args);
    let result = '';
    if (flags.has('-jank')) {
      result += this.dumpJank();
    }
    if (flags.has('-all')) {
      result += this.dumpAll();
    }
    return result;
  }

  private getBaseTime(): time {
    if (this.displayFrames.length === 0) return Time.ZERO;
    return this.displayFrames[0].getBaseTime(this.resolve) ?? Time.ZERO;
  }

  private finalizeCurrentDisplayFrame() {
    while (this.displayFrames.length >= this.maxDisplayFrames) {
      const evicted = this.displayFrames.shift();
      if (evicted === undefined) break;
      this.pendingPresentFences = this.pendingPresentFences.filter(
        (pending) => pending.displayFrame !== evicted,
      );
      this.releaseSurfaceFrames(evicted);
    }
    this.displayFrames.push(this.currentDisplayFrame);
    this.currentDisplayFrame = new DisplayFrame(this.context);
  }

  private releaseSurfaceFrames(displayFrame: DisplayFrame) {
    for (const handle of displayFrame.children) {
      this.surfaceFrames.delete(handle);
    }
  }

  private newHandle(): SurfaceFrameHandle {
    return SurfaceFrameHandle.fromRaw(this.nextHandle++);
  }

  private withSurfaceFrame(
    handle: SurfaceFrameHandle,
    operation: string,
    fn: (surfaceFrame: SurfaceFrame) => void,
  ) {
    const surfaceFrame = this.surfaceFrames.get(handle);
    if (surfaceFrame === undefined) {
      console.warn(
        `FrameTimeline: ${operation} on unknown surface frame ${handle}`,
      );
      return;
    }
    fn(surfaceFrame);
  }
}

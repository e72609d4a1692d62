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
import {Time, time} from '../base/time';
import {FrameTimeline} from './frame_timeline';
import {JankType} from './jank_type';
import {
  FenceSignal,
  FrameTimelineEvent,
  FramePresentMetadata,
  PredictionState,
  PresentFence,
  PresentState,
  SurfaceFrameHandle,
  Token,
} from './types';

const REFRESH_RATE = Fps.fromValue(60);
const COMPOSITOR_PID = 100;

function ms(millis: number) {
  return Time.fromMillis(millis);
}

function timelineItem(start: number, end: number, present: number) {
  return {startTime: ms(start), endTime: ms(end), presentTime: ms(present)};
}

function signaled(millis: number): FenceSignal {
  return {state: 'signaled', signalTime: ms(millis)};
}

class FakeFence implements PresentFence {
  constructor(public signal: FenceSignal) {}

  getSignalTime(): FenceSignal {
    return this.signal;
  }
}

describe('FrameTimeline', () => {
  let now: time;
  let incrementJankyFrames: jest.Mock;
  let events: FrameTimelineEvent[];

  beforeEach(() => {
    now = Time.ZERO;
    incrementJankyFrames = jest.fn();
    events = [];
  });

  function createFrameTimeline(maxDisplayFrames?: number) {
    return new FrameTimeline({
      timeStats: {incrementJankyFrames},
      pid: COMPOSITOR_PID,
      config: maxDisplayFrames === undefined ? {} : {maxDisplayFrames},
      clock: () => now,
      sink: {emit: (event) => events.push(event)},
    });
  }

  function present(
    frameTimeline: FrameTimeline,
    token: Token,
    wakeUp: number,
    end: number,
    signal: FenceSignal,
  ) {
    frameTimeline.setSfWakeUp(token, ms(wakeUp), REFRESH_RATE);
    const fence = new FakeFence(signal);
    frameTimeline.setSfPresent(ms(end), fence);
    return fence;
  }

  // A surface frame predicted at (0, 10, 16) ms that became ready at 11 ms
  // and is latched into the current display frame.
  function latchSurfaceFrame(frameTimeline: FrameTimeline) {
    const token = frameTimeline.generateToken(timelineItem(0, 10, 16));
    const handle = frameTimeline.createSurfaceFrameForToken(
      {token},
      10,
      1000,
      'Surface#1',
      'layer1',
    );
    frameTimeline.recordSurfaceQueued(handle, ms(5));
    frameTimeline.recordSurfaceReady(handle, ms(11));
    frameTimeline.setPresentOutcome(handle, PresentState.Presented);
    frameTimeline.addSurfaceFrame(handle);
    return handle;
  }

  test('tokens', () => {
    const frameTimeline = createFrameTimeline();
    const first = frameTimeline.generateToken(timelineItem(0, 10, 16));
    const second = frameTimeline.generateToken(timelineItem(16, 26, 32));
    expect(second).toBe(first + 1);
    expect(frameTimeline.getPredictionsForToken(second)).toEqual(
      timelineItem(16, 26, 32),
    );
  });

  test('prediction state of new surface frames', () => {
    const frameTimeline = createFrameTimeline();
    const token = frameTimeline.generateToken(timelineItem(0, 10, 16));
    const create = (surfaceToken: Token) =>
      frameTimeline.getSurfaceFrame(
        frameTimeline.createSurfaceFrameForToken(
          {token: surfaceToken},
          10,
          1000,
          'Surface#1',
          'layer1',
        ),
      )?.predictionState;

    expect(create(-1)).toBe(PredictionState.None);
    expect(create(token)).toBe(PredictionState.Valid);
    now = ms(120);
    expect(create(token)).toBe(PredictionState.Expired);
    expect(frameTimeline.surfaceFrameCount).toBe(3);
  });

  test('classifies once the present fence signals', () => {
    const frameTimeline = createFrameTimeline();
    const handle = latchSurfaceFrame(frameTimeline);
    const displayToken = frameTimeline.generateToken(timelineItem(2, 12, 16));
    present(frameTimeline, displayToken, 2, 12, signaled(26));

    const [displayFrame] = frameTimeline.getDisplayFrames();
    expect(displayFrame.jankType).toBe(JankType.PredictionError);
    expect(frameTimeline.getSurfaceFrame(handle)?.jankType).toBe(
      JankType.PredictionError,
    );
    expect(frameTimeline.pendingPresentFenceCount).toBe(0);
    expect(incrementJankyFrames).toHaveBeenCalledTimes(1);
    expect(incrementJankyFrames).toHaveBeenCalledWith(
      expect.objectContaining({
        uid: 1000,
        layerName: 'Surface#1',
        jankType: JankType.PredictionError,
        appDeadlineDelta: 1_000_000n,
      }),
    );
  });

  test('traces classified frames to the sink', () => {
    const frameTimeline = createFrameTimeline();
    latchSurfaceFrame(frameTimeline);
    const displayToken = frameTimeline.generateToken(timelineItem(2, 12, 16));
    present(frameTimeline, displayToken, 2, 12, signaled(16));

    expect(events.map((event) => event.kind)).toEqual([
      'ExpectedDisplayFrameStart',
      'FrameEnd',
      'ActualDisplayFrameStart',
      'FrameEnd',
      'ExpectedSurfaceFrameStart',
      'FrameEnd',
      'ActualSurfaceFrameStart',
      'FrameEnd',
    ]);
    expect(events[0]).toEqual(
      expect.objectContaining({token: displayToken, pid: COMPOSITOR_PID}),
    );
  });

  test('a pending fence holds back the frames presented after it', () => {
    const frameTimeline = createFrameTimeline();
    const firstFence = present(frameTimeline, 1, 2, 12, {state: 'pending'});
    present(frameTimeline, 2, 20, 30, signaled(40));

    const [first, second] = frameTimeline.getDisplayFrames();
    expect(frameTimeline.pendingPresentFenceCount).toBe(2);
    expect(second.getActuals().presentTime).toBe(Time.ZERO);

    firstFence.signal = signaled(20);
    frameTimeline.flushPendingPresentFences();
    expect(frameTimeline.pendingPresentFenceCount).toBe(0);
    expect(first.getActuals().presentTime).toBe(ms(20));
    expect(second.getActuals().presentTime).toBe(ms(40));
  });

  test('frames with an invalid fence are never classified', () => {
    const frameTimeline = createFrameTimeline();
    latchSurfaceFrame(frameTimeline);
    present(frameTimeline, 1, 2, 12, {state: 'invalid'});

    const [displayFrame] = frameTimeline.getDisplayFrames();
    expect(frameTimeline.pendingPresentFenceCount).toBe(0);
    expect(displayFrame.framePresentMetadata).toBe(
      FramePresentMetadata.UnknownPresent,
    );
    expect(incrementJankyFrames).not.toHaveBeenCalled();
    expect(events).toEqual([]);
  });

  test('keeps the most recent display frames', () => {
    const frameTimeline = createFrameTimeline(3);
    for (let token = 10; token < 15; token++) {
      present(frameTimeline, token, 2, 12, signaled(16));
    }
    const tokens = frameTimeline
      .getDisplayFrames()
      .map((displayFrame) => displayFrame.token);
    expect(tokens).toEqual([12, 13, 14]);
  });

  function createUnlatchedSurfaceFrame(frameTimeline: FrameTimeline) {
    return frameTimeline.createSurfaceFrameForToken(
      {token: -1},
      10,
      1000,
      'Surface#2',
      'layer2',
    );
  }

  test('evicting a display frame releases its surface frames', () => {
    const frameTimeline = createFrameTimeline(1);
    latchSurfaceFrame(frameTimeline);
    present(frameTimeline, 1, 2, 12, signaled(16));
    const unlatched = createUnlatchedSurfaceFrame(frameTimeline);
    expect(frameTimeline.surfaceFrameCount).toBe(2);

    present(frameTimeline, 2, 20, 30, signaled(34));
    expect(frameTimeline.surfaceFrameCount).toBe(1);
    expect(frameTimeline.getSurfaceFrame(unlatched)).toBeDefined();
  });

  test('resizing the history releases unlatched surface frames', () => {
    const frameTimeline = createFrameTimeline(3);
    for (let i = 0; i < 100; i++) {
      createUnlatchedSurfaceFrame(frameTimeline);
    }
    for (let token = 1; token <= 5; token++) {
      present(frameTimeline, token, 2, 12, signaled(16));
    }
    const latched = latchSurfaceFrame(frameTimeline);
    expect(frameTimeline.surfaceFrameCount).toBe(101);

    frameTimeline.setMaxDisplayFrames(3);
    expect(frameTimeline.surfaceFrameCount).toBe(1);
    expect(frameTimeline.getSurfaceFrame(latched)).toBeDefined();

    // The latched frame is released once its display frame is gone.
    present(frameTimeline, 6, 2, 12, signaled(16));
    frameTimeline.reset();
    expect(frameTimeline.surfaceFrameCount).toBe(0);
  });

  test('releasing a surface frame', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => {});
    try {
      const frameTimeline = createFrameTimeline();
      const handle = createUnlatchedSurfaceFrame(frameTimeline);
      frameTimeline.releaseSurfaceFrame(handle);
      expect(frameTimeline.surfaceFrameCount).toBe(0);
      expect(frameTimeline.getSurfaceFrame(handle)).toBeUndefined();
      expect(warn).not.toHaveBeenCalled();

      frameTimeline.releaseSurfaceFrame(handle);
      expect(warn).toHaveBeenCalledWith(
        `FrameTimeline: releaseSurfaceFrame on unknown surface frame ${handle}`,
      );
    } finally {
      warn.mockRestore();
    }
  });

  test('evicting a display frame drops its pending fence', () => {
    const frameTimeline = createFrameTimeline(1);
    present(frameTimeline, 1, 2, 12, {state: 'pending'});
    present(frameTimeline, 2, 20, 30, {state: 'pending'});
    expect(frameTimeline.pendingPresentFenceCount).toBe(1);
  });

  test('ignores unknown surface frames', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => {});
    try {
      const frameTimeline = createFrameTimeline();
      frameTimeline.recordSurfaceReady(SurfaceFrameHandle.fromRaw(42), ms(1));
      expect(warn).toHaveBeenCalledWith(
        'FrameTimeline: recordSurfaceReady on unknown surface frame 42',
      );
    } finally {
      warn.mockRestore();
    }
  });

  test('resizing the history', () => {
    const frameTimeline = createFrameTimeline(2);
    present(frameTimeline, 1, 2, 12, signaled(16));
    present(frameTimeline, 2, 20, 30, signaled(34));

    frameTimeline.setMaxDisplayFrames(5);
    expect(frameTimeline.getDisplayFrames()).toEqual([]);
    for (let token = 3; token < 6; token++) {
      present(frameTimeline, token, 2, 12, signaled(16));
    }
    expect(frameTimeline.getDisplayFrames().length).toBe(3);

    frameTimeline.reset();
    for (let token = 6; token < 9; token++) {
      present(frameTimeline, token, 2, 12, signaled(16));
    }
    expect(frameTimeline.getDisplayFrames().length).toBe(2);

    expect(() => frameTimeline.setMaxDisplayFrames(0)).toThrow(FatalError);
    expect(() => frameTimeline.setMaxDisplayFrames(1.5)).toThrow(FatalError);
  });

  test('dump', () => {
    const frameTimeline = createFrameTimeline();
    expect(frameTimeline.dumpAll()).toBe('Number of display frames : 0\n');

    const token = frameTimeline.generateToken(timelineItem(2, 12, 16));
    present(frameTimeline, token, 2, 12, {state: 'pending'});
    const dump = frameTimeline.dumpAll();
    expect(frameTimeline.dumpAll()).toBe(dump);

    const lines = dump.split('\n');
    expect(lines.slice(0, 3)).toEqual([
      'Number of display frames : 1',
      'Display Frame 0',
      'Prediction State : Valid',
    ]);
    expect(lines).toContain(
      'Actual     |         0.00 |        10.00 |          N/A',
    );
  });

  test('dump only janky frames', () => {
    const frameTimeline = createFrameTimeline();
    const onTime = frameTimeline.generateToken(timelineItem(2, 12, 16));
    const late = frameTimeline.generateToken(timelineItem(20, 30, 34));
    present(frameTimeline, onTime, 2, 12, signaled(16));
    expect(frameTimeline.dumpJank()).toBe('');
    expect(frameTimeline.parseArgs(['-jank'])).toBe('');

    present(frameTimeline, late, 20, 30, signaled(44));
    const jank = frameTimeline.dumpJank();
    expect(jank.startsWith('Display Frame 1 [*]\n')).toBe(true);
    expect(jank).not.toContain('Display Frame 0');
    expect(frameTimeline.parseArgs(['-all'])).toBe(frameTimeline.dumpAll());
    expect(frameTimeline.parseArgs(['-jank', '-all'])).toBe(
      jank + frameTimeline.dumpAll(),
    );
  });
});

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
import {Time} from '../base/time';
import {DisplayFrame} from './display_frame';
import {JankType} from './jank_type';
import {FrameContext, SurfaceFrame} from './surface_frame';
import {
  DEFAULT_JANK_THRESHOLDS,
  FramePresentMetadata,
  FrameReadyMetadata,
  FrameStartMetadata,
  FrameTimelineEvent,
  PredictionState,
  PresentState,
  PresentType,
  SurfaceFrameHandle,
  TraceCookieCounter,
} from './types';

const REFRESH_RATE = Fps.fromValue(60);

function ms(millis: number) {
  return Time.fromMillis(millis);
}

function timelineItem(start: number, end: number, present: number) {
  return {startTime: ms(start), endTime: ms(end), presentTime: ms(present)};
}

describe('DisplayFrame', () => {
  let context: FrameContext;
  let surfaceFrames: Map<SurfaceFrameHandle, SurfaceFrame>;
  const resolve = (handle: SurfaceFrameHandle) => surfaceFrames.get(handle);

  beforeEach(() => {
    context = {
      timeStats: {incrementJankyFrames: jest.fn()},
      thresholds: DEFAULT_JANK_THRESHOLDS,
      cookieCounter: new TraceCookieCounter(),
    };
    surfaceFrames = new Map();
  });

  // Armed with predictions (2, 12, 16) ms, woken up at |wakeUp| ms.
  function createDisplayFrame(wakeUp = 2) {
    const displayFrame = new DisplayFrame(context);
    displayFrame.onSfWakeUp(
      7,
      REFRESH_RATE,
      timelineItem(2, 12, 16),
      ms(wakeUp),
    );
    return displayFrame;
  }

  // Adds a presented surface frame predicted at (0, 10, 16) ms that was
  // ready at |end| ms.
  function addSurfaceFrame(displayFrame: DisplayFrame, end: number) {
    const surfaceFrame = new SurfaceFrame(
      {
        info: {token: 3},
        ownerPid: 10,
        ownerUid: 1000,
        layerName: 'Surface#1',
        debugName: 'layer1',
        predictionState: PredictionState.Valid,
        predictions: timelineItem(0, 10, 16),
      },
      context,
    );
    surfaceFrame.setAcquireFenceTime(ms(end));
    surfaceFrame.setPresentState(PresentState.Presented);
    const handle = SurfaceFrameHandle.fromRaw(surfaceFrames.size + 1);
    surfaceFrames.set(handle, surfaceFrame);
    displayFrame.addSurfaceFrame(handle);
    return surfaceFrame;
  }

  test('on time', () => {
    const displayFrame = createDisplayFrame();
    displayFrame.setActualEndTime(ms(12));
    displayFrame.onPresent(ms(16), resolve);
    expect(displayFrame.predictionState).toBe(PredictionState.Valid);
    expect(displayFrame.jankType).toBe(JankType.None);
    expect(displayFrame.framePresentMetadata).toBe(
      FramePresentMetadata.OnTimePresent,
    );
    expect(displayFrame.frameReadyMetadata).toBe(
      FrameReadyMetadata.OnTimeFinish,
    );
    expect(displayFrame.frameStartMetadata).toBe(
      FrameStartMetadata.OnTimeStart,
    );
  });

  test('late start', () => {
    const displayFrame = createDisplayFrame(5);
    displayFrame.setActualEndTime(ms(12));
    displayFrame.onPresent(ms(16), resolve);
    expect(displayFrame.frameStartMetadata).toBe(FrameStartMetadata.LateStart);
  });

  test('late present off the vsync grid is a prediction error', () => {
    const displayFrame = createDisplayFrame();
    displayFrame.setActualEndTime(ms(12));
    displayFrame.onPresent(ms(26), resolve);
    expect(displayFrame.jankType).toBe(JankType.PredictionError);
  });

  test('late present on the vsync grid is the display driver', () => {
    const displayFrame = createDisplayFrame();
    displayFrame.setActualEndTime(ms(12));
    displayFrame.onPresent(Time.add(ms(16), REFRESH_RATE.period), resolve);
    expect(displayFrame.jankType).toBe(JankType.DisplayDriverLate);
  });

  test('late present after a late finish is the compositor', () => {
    const displayFrame = createDisplayFrame();
    displayFrame.setActualEndTime(ms(15));
    displayFrame.onPresent(ms(26), resolve);
    expect(displayFrame.frameReadyMetadata).toBe(
      FrameReadyMetadata.LateFinish,
    );
    expect(displayFrame.jankType).toBe(JankType.CompositorCpuDeadlineMissed);
  });

  test('early present is a scheduling issue', () => {
    const displayFrame = createDisplayFrame();
    displayFrame.setActualEndTime(ms(12));
    displayFrame.onPresent(Time.sub(ms(16), REFRESH_RATE.period), resolve);
    expect(displayFrame.framePresentMetadata).toBe(
      FramePresentMetadata.EarlyPresent,
    );
    expect(displayFrame.jankType).toBe(JankType.CompositorScheduling);
  });

  test('early present after a late finish is a scheduling issue', () => {
    const displayFrame = new DisplayFrame(context);
    displayFrame.onSfWakeUp(7, REFRESH_RATE, timelineItem(20, 30, 40), ms(20));
    displayFrame.setActualEndTime(ms(33));
    displayFrame.onPresent(ms(36), resolve);
    expect(displayFrame.jankType).toBe(JankType.CompositorScheduling);
  });

  test('expired predictions are unknown', () => {
    const displayFrame = new DisplayFrame(context);
    displayFrame.onSfWakeUp(7, REFRESH_RATE, undefined, ms(2));
    const surfaceFrame = addSurfaceFrame(displayFrame, 15);
    displayFrame.setActualEndTime(ms(12));
    displayFrame.onPresent(ms(26), resolve);
    expect(displayFrame.predictionState).toBe(PredictionState.Expired);
    expect(displayFrame.jankType).toBe(JankType.Unknown);
    expect(surfaceFrame.jankType).toBe(JankType.Unknown);
    expect(context.timeStats.incrementJankyFrames).toHaveBeenCalledWith(
      expect.objectContaining({
        displayDeadlineDelta: -1n,
        displayPresentDelta: -1n,
      }),
    );
  });

  test('frames that were never armed are not classified', () => {
    const displayFrame = new DisplayFrame(context);
    const surfaceFrame = addSurfaceFrame(displayFrame, 11);
    displayFrame.onPresent(ms(16), resolve);
    expect(displayFrame.predictionState).toBe(PredictionState.None);
    expect(displayFrame.jankType).toBe(JankType.None);
    expect(displayFrame.framePresentMetadata).toBe(
      FramePresentMetadata.UnknownPresent,
    );
    expect(surfaceFrame.getActuals().presentTime).toBe(ms(16));
    expect(surfaceFrame.jankType).toBe(JankType.None);
  });

  test('an invalid refresh rate is fatal', () => {
    const displayFrame = new DisplayFrame(context);
    expect(() =>
      displayFrame.onSfWakeUp(7, Fps.INVALID, timelineItem(2, 12, 16), ms(2)),
    ).toThrow(FatalError);
  });

  test('cascades the verdict to its surface frames', () => {
    const displayFrame = createDisplayFrame();
    const lateSurfaceFrame = addSurfaceFrame(displayFrame, 15);
    const onTimeSurfaceFrame = addSurfaceFrame(displayFrame, 11);
    displayFrame.setActualEndTime(ms(15));
    displayFrame.onPresent(ms(26), resolve);

    expect(displayFrame.jankType).toBe(JankType.CompositorCpuDeadlineMissed);
    expect(lateSurfaceFrame.jankType).toBe(
      JankType.CompositorCpuDeadlineMissed,
    );
    expect(onTimeSurfaceFrame.jankType).toBe(
      JankType.CompositorCpuDeadlineMissed,
    );
    expect(context.timeStats.incrementJankyFrames).toHaveBeenCalledTimes(2);
    expect(context.timeStats.incrementJankyFrames).toHaveBeenCalledWith(
      expect.objectContaining({
        displayDeadlineDelta: 3_000_000n,
        displayPresentDelta: 10_000_000n,
        appDeadlineDelta: 5_000_000n,
      }),
    );
  });

  test('surface frames that are gone are skipped', () => {
    const displayFrame = createDisplayFrame();
    displayFrame.addSurfaceFrame(SurfaceFrameHandle.fromRaw(99));
    displayFrame.setActualEndTime(ms(12));
    expect(() => displayFrame.onPresent(ms(16), resolve)).not.toThrow();
  });

  test('is janky if any surface frame is', () => {
    const displayFrame = createDisplayFrame();
    addSurfaceFrame(displayFrame, 15);
    displayFrame.setActualEndTime(ms(12));
    displayFrame.onPresent(ms(26), resolve);
    expect(displayFrame.jankType).toBe(JankType.PredictionError);

    const cleanFrame = createDisplayFrame();
    const surfaceFrame = addSurfaceFrame(cleanFrame, 11);
    cleanFrame.setActualEndTime(ms(12));
    cleanFrame.onPresent(ms(16), resolve);
    expect(cleanFrame.isJanky(resolve)).toBe(false);
    expect(surfaceFrame.jankType).toBe(JankType.None);
    expect(displayFrame.isJanky(resolve)).toBe(true);
  });

  test('base time covers its surface frames', () => {
    const displayFrame = createDisplayFrame();
    expect(displayFrame.getBaseTime(resolve)).toBe(ms(2));
    // The surface frame is predicted to start before the display frame.
    addSurfaceFrame(displayFrame, 11);
    expect(displayFrame.getBaseTime(resolve)).toBe(ms(0));
  });

  test('trace', () => {
    const events: FrameTimelineEvent[] = [];
    const displayFrame = createDisplayFrame();
    addSurfaceFrame(displayFrame, 11);
    displayFrame.setActualEndTime(ms(12));
    displayFrame.setGpuComposition(true);
    displayFrame.onPresent(ms(16), resolve);
    displayFrame.trace(100, {emit: (event) => events.push(event)}, resolve);

    expect(events.map((event) => [event.kind, event.cookie])).toEqual([
      ['ExpectedDisplayFrameStart', 1],
      ['FrameEnd', 1],
      ['ActualDisplayFrameStart', 2],
      ['FrameEnd', 2],
      ['ExpectedSurfaceFrameStart', 3],
      ['FrameEnd', 3],
      ['ActualSurfaceFrameStart', 4],
      ['FrameEnd', 4],
    ]);
    expect(events[0]).toEqual({
      kind: 'ExpectedDisplayFrameStart',
      ts: ms(2),
      cookie: 1,
      token: 7,
      pid: 100,
    });
    expect(events[2]).toEqual({
      kind: 'ActualDisplayFrameStart',
      ts: ms(2),
      cookie: 2,
      token: 7,
      pid: 100,
      presentType: PresentType.OnTime,
      onTimeFinish: true,
      gpuComposition: true,
      jankType: JankType.None,
    });
    expect(events[3]).toEqual({kind: 'FrameEnd', ts: ms(12), cookie: 2});
    expect(events[4]).toEqual(
      expect.objectContaining({token: 3, displayFrameToken: 7}),
    );
  });

  test('dump', () => {
    const displayFrame = createDisplayFrame();
    displayFrame.setActualEndTime(ms(12));
    displayFrame.onPresent(ms(26), resolve);
    expect(displayFrame.dump(ms(2), resolve).split('\n')).toEqual([
      ' [*]',
      'Prediction State : Valid',
      'Jank Type : Prediction Error',
      'Present Metadata : Late Present',
      'Finish Metadata: On Time Finish',
      'Start Metadata: On Time Start',
      'Vsync Period: 16.666666',
      'Present delta: 10.000000',
      'Present delta % refreshrate: 10.000000',
      '           |   Start time |     End time | Present time',
      'Expected   |         0.00 |        10.00 |        14.00',
      'Actual     |         0.00 |        10.00 |        24.00',
      '-'.repeat(55),
      '',
      '',
      '',
    ]);
  });
});

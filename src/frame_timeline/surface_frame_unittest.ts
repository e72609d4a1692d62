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
import {JankType} from './jank_type';
import {FrameContext, SurfaceFrame} from './surface_frame';
import {
  DEFAULT_JANK_THRESHOLDS,
  FramePresentMetadata,
  FrameReadyMetadata,
  FrameTimelineEvent,
  INVALID_TOKEN,
  PredictionState,
  PresentState,
  PresentType,
  TimelineItem,
  TraceCookieCounter,
} from './types';

const REFRESH_RATE = Fps.fromValue(60);

function ms(millis: number) {
  return Time.fromMillis(millis);
}

function timelineItem(start: number, end: number, present: number) {
  return {startTime: ms(start), endTime: ms(end), presentTime: ms(present)};
}

function createContext(): FrameContext {
  return {
    timeStats: {incrementJankyFrames: jest.fn()},
    thresholds: DEFAULT_JANK_THRESHOLDS,
    cookieCounter: new TraceCookieCounter(),
  };
}

function createSurfaceFrame(
  context: FrameContext,
  predictionState = PredictionState.Valid,
  predictions: TimelineItem = timelineItem(0, 10, 16),
  token = 1,
) {
  return new SurfaceFrame(
    {
      info: {token},
      ownerPid: 10,
      ownerUid: 1000,
      layerName: 'Surface#1',
      debugName: 'layer1',
      predictionState,
      predictions,
    },
    context,
  );
}

// Finishes at |end| ms, gets presented at |present| ms.
function present(
  surfaceFrame: SurfaceFrame,
  end: number,
  presentAt: number,
  displayFrameJankType = JankType.None,
) {
  surfaceFrame.setAcquireFenceTime(ms(end));
  surfaceFrame.setPresentState(PresentState.Presented);
  surfaceFrame.onPresent(
    ms(presentAt),
    displayFrameJankType,
    REFRESH_RATE,
    0n,
    0n,
  );
}

describe('SurfaceFrame classification', () => {
  let context: FrameContext;

  beforeEach(() => {
    context = createContext();
  });

  test('on time present is never janky', () => {
    const surfaceFrame = createSurfaceFrame(context);
    present(surfaceFrame, 11, 16);
    expect(surfaceFrame.frameReadyMetadata).toBe(
      FrameReadyMetadata.OnTimeFinish,
    );
    expect(surfaceFrame.framePresentMetadata).toBe(
      FramePresentMetadata.OnTimePresent,
    );
    expect(surfaceFrame.jankType).toBe(JankType.None);
  });

  test('late present off the vsync grid is a prediction error', () => {
    const surfaceFrame = createSurfaceFrame(context);
    present(surfaceFrame, 11, 26);
    expect(surfaceFrame.framePresentMetadata).toBe(
      FramePresentMetadata.LatePresent,
    );
    expect(surfaceFrame.frameReadyMetadata).toBe(
      FrameReadyMetadata.OnTimeFinish,
    );
    expect(surfaceFrame.jankType).toBe(JankType.PredictionError);
  });

  test('late present on the vsync grid is a scheduling issue', () => {
    const surfaceFrame = createSurfaceFrame(context);
    surfaceFrame.setAcquireFenceTime(ms(11));
    surfaceFrame.setPresentState(PresentState.Presented);
    // One full vsync late.
    surfaceFrame.onPresent(
      Time.add(ms(16), REFRESH_RATE.period),
      JankType.None,
      REFRESH_RATE,
      0n,
      0n,
    );
    expect(surfaceFrame.jankType).toBe(JankType.CompositorScheduling);
  });

  test('late present with on time finish takes the display jank', () => {
    const surfaceFrame = createSurfaceFrame(context);
    present(surfaceFrame, 11, 26, JankType.DisplayDriverLate);
    expect(surfaceFrame.jankType).toBe(JankType.DisplayDriverLate);
  });

  test('late finish on a clean display frame is the producer', () => {
    const surfaceFrame = createSurfaceFrame(context);
    present(surfaceFrame, 15, 26);
    expect(surfaceFrame.frameReadyMetadata).toBe(
      FrameReadyMetadata.LateFinish,
    );
    expect(surfaceFrame.jankType).toBe(JankType.ProducerDeadlineMissed);
  });

  test('late finish on a janky display frame takes the display jank', () => {
    const surfaceFrame = createSurfaceFrame(context);
    present(surfaceFrame, 15, 26, JankType.CompositorCpuDeadlineMissed);
    expect(surfaceFrame.jankType).toBe(JankType.CompositorCpuDeadlineMissed);
  });

  test('buffer stuffing adds to the other causes', () => {
    const surfaceFrame = createSurfaceFrame(context);
    surfaceFrame.setAcquireFenceTime(ms(11));
    // The previous buffer was latched after this one's deadline.
    surfaceFrame.setPresentState(PresentState.Presented, ms(12));
    surfaceFrame.onPresent(ms(26), JankType.None, REFRESH_RATE, 0n, 0n);
    expect(surfaceFrame.jankType).toBe(
      JankType.BufferStuffing | JankType.PredictionError,
    );
  });

  test('early present on the vsync grid is a scheduling issue', () => {
    const surfaceFrame = createSurfaceFrame(
      context,
      PredictionState.Valid,
      timelineItem(20, 30, 40),
    );
    surfaceFrame.setAcquireFenceTime(ms(30));
    surfaceFrame.setPresentState(PresentState.Presented);
    surfaceFrame.onPresent(
      Time.sub(ms(40), REFRESH_RATE.period),
      JankType.None,
      REFRESH_RATE,
      0n,
      0n,
    );
    expect(surfaceFrame.framePresentMetadata).toBe(
      FramePresentMetadata.EarlyPresent,
    );
    expect(surfaceFrame.jankType).toBe(JankType.CompositorScheduling);
  });

  test('early present off the vsync grid is a prediction error', () => {
    const surfaceFrame = createSurfaceFrame(
      context,
      PredictionState.Valid,
      timelineItem(20, 30, 40),
    );
    present(surfaceFrame, 30, 30);
    expect(surfaceFrame.jankType).toBe(JankType.PredictionError);
  });

  test('early present with late finish is unknown', () => {
    const surfaceFrame = createSurfaceFrame(
      context,
      PredictionState.Valid,
      timelineItem(20, 30, 40),
    );
    present(surfaceFrame, 35, 36);
    expect(surfaceFrame.frameReadyMetadata).toBe(
      FrameReadyMetadata.LateFinish,
    );
    expect(surfaceFrame.jankType).toBe(JankType.Unknown);
  });

  test('expired predictions are unknown', () => {
    const surfaceFrame = createSurfaceFrame(
      context,
      PredictionState.Expired,
      timelineItem(0, 0, 0),
    );
    present(surfaceFrame, 11, 26);
    expect(surfaceFrame.jankType).toBe(JankType.Unknown);
    expect(surfaceFrame.framePresentMetadata).toBe(
      FramePresentMetadata.UnknownPresent,
    );
    expect(surfaceFrame.frameReadyMetadata).toBe(
      FrameReadyMetadata.UnknownFinish,
    );
    expect(context.timeStats.incrementJankyFrames).toHaveBeenCalledWith(
      expect.objectContaining({
        jankType: JankType.Unknown,
        appDeadlineDelta: -1n,
      }),
    );
  });

  test('frames without a token are not classified', () => {
    const surfaceFrame = createSurfaceFrame(
      context,
      PredictionState.None,
      timelineItem(0, 0, 0),
      INVALID_TOKEN,
    );
    present(surfaceFrame, 11, 26);
    expect(surfaceFrame.getActuals().presentTime).toBe(ms(26));
    expect(surfaceFrame.jankType).toBe(JankType.None);
    expect(surfaceFrame.framePresentMetadata).toBe(
      FramePresentMetadata.UnknownPresent,
    );
    expect(context.timeStats.incrementJankyFrames).not.toHaveBeenCalled();
  });

  test('dropped frames are left untouched', () => {
    const surfaceFrame = createSurfaceFrame(context);
    surfaceFrame.setPresentState(PresentState.Dropped);
    surfaceFrame.onPresent(ms(26), JankType.None, REFRESH_RATE, 0n, 0n);
    expect(surfaceFrame.jankType).toBeUndefined();
    expect(surfaceFrame.getActuals().presentTime).toBe(Time.ZERO);
    expect(context.timeStats.incrementJankyFrames).not.toHaveBeenCalled();
  });

  test('reports each classified frame', () => {
    const surfaceFrame = createSurfaceFrame(context);
    surfaceFrame.setRenderRate(Fps.fromValue(30));
    surfaceFrame.setAcquireFenceTime(ms(11));
    surfaceFrame.setPresentState(PresentState.Presented);
    surfaceFrame.onPresent(
      ms(26),
      JankType.None,
      REFRESH_RATE,
      3_000_000n,
      4_000_000n,
    );
    expect(context.timeStats.incrementJankyFrames).toHaveBeenCalledTimes(1);
    expect(context.timeStats.incrementJankyFrames).toHaveBeenCalledWith({
      refreshRate: REFRESH_RATE,
      renderRate: Fps.fromValue(30),
      uid: 1000,
      layerName: 'Surface#1',
      jankType: JankType.PredictionError,
      displayDeadlineDelta: 3_000_000n,
      displayPresentDelta: 4_000_000n,
      appDeadlineDelta: 1_000_000n,
    });
  });
});

describe('SurfaceFrame', () => {
  test('ready time is the later of queue and acquire', () => {
    const surfaceFrame = createSurfaceFrame(createContext());
    surfaceFrame.setActualQueueTime(ms(12));
    surfaceFrame.setAcquireFenceTime(ms(11));
    expect(surfaceFrame.getActuals().endTime).toBe(ms(12));
    surfaceFrame.setAcquireFenceTime(ms(13));
    expect(surfaceFrame.getActuals().endTime).toBe(ms(13));
  });

  test('present state can only be set once', () => {
    const surfaceFrame = createSurfaceFrame(createContext());
    surfaceFrame.setPresentState(PresentState.Presented);
    expect(() => surfaceFrame.setPresentState(PresentState.Dropped)).toThrow(
      FatalError,
    );
    expect(() => surfaceFrame.setPresentState(PresentState.Dropped)).toThrow(
      'setPresentState called on a SurfaceFrame from Layer - layer1, ' +
        'that has a PresentState - Presented set already.',
    );
    expect(surfaceFrame.presentState).toBe(PresentState.Presented);
  });

  test('base time is the earliest timestamp', () => {
    const surfaceFrame = createSurfaceFrame(
      createContext(),
      PredictionState.Valid,
      timelineItem(5, 10, 16),
    );
    surfaceFrame.setActualStartTime(ms(3));
    expect(surfaceFrame.getBaseTime()).toBe(ms(3));
  });

  test('dump', () => {
    const surfaceFrame = createSurfaceFrame(createContext());
    present(surfaceFrame, 11, 16);
    expect(surfaceFrame.dump('', Time.ZERO)).toBe(
      [
        'Layer - layer1',
        'Token: 1',
        'Owner Pid : 10',
        'Scheduled rendering rate: 0 fps',
        'Present State : Presented',
        'Prediction State : Valid',
        'Jank Type : None',
        'Present Metadata : On Time Present',
        'Finish Metadata: On Time Finish',
        'Last latch time: 0.000000',
        'Present delta: 0.000000',
        '           |   Start time |     End time | Present time',
        'Expected   |         0.00 |        10.00 |        16.00',
        'Actual     |          N/A |        11.00 |        16.00',
        '-'.repeat(55),
        '',
      ].join('\n'),
    );
  });

  test('dump marks janky frames and indents', () => {
    const surfaceFrame = createSurfaceFrame(createContext());
    present(surfaceFrame, 11, 26);
    const lines = surfaceFrame.dump('    ', Time.ZERO).split('\n');
    expect(lines[0]).toBe('    Layer - layer1 [*]');
    expect(lines[6]).toBe('    Jank Type : Prediction Error');
    expect(lines[10]).toBe('    Present delta: 10.000000');
  });
});

describe('SurfaceFrame tracing', () => {
  test('emits expected and actual timelines', () => {
    const events: FrameTimelineEvent[] = [];
    const surfaceFrame = createSurfaceFrame(createContext());
    present(surfaceFrame, 11, 26);
    surfaceFrame.trace(5, {emit: (event) => events.push(event)});
    expect(events).toEqual([
      {
        kind: 'ExpectedSurfaceFrameStart',
        ts: ms(0),
        cookie: 1,
        token: 1,
        displayFrameToken: 5,
        pid: 10,
        layerName: 'layer1',
      },
      {kind: 'FrameEnd', ts: ms(10), cookie: 1},
      {
        kind: 'ActualSurfaceFrameStart',
        ts: ms(0),
        cookie: 2,
        token: 1,
        displayFrameToken: 5,
        pid: 10,
        layerName: 'layer1',
        presentType: PresentType.Late,
        onTimeFinish: true,
        gpuComposition: false,
        jankType: JankType.PredictionError,
      },
      {kind: 'FrameEnd', ts: ms(11), cookie: 2},
    ]);
  });

  test('dropped frames are traced as dropped', () => {
    const events: FrameTimelineEvent[] = [];
    const surfaceFrame = createSurfaceFrame(createContext());
    surfaceFrame.setPresentState(PresentState.Dropped);
    surfaceFrame.trace(5, {emit: (event) => events.push(event)});
    expect(events[2]).toEqual(
      expect.objectContaining({presentType: PresentType.Dropped}),
    );
  });

  test('frames without a token are not traced', () => {
    const debug = jest.spyOn(console, 'debug').mockImplementation(() => {});
    const emit = jest.fn();
    const surfaceFrame = createSurfaceFrame(
      createContext(),
      PredictionState.None,
      timelineItem(0, 0, 0),
      INVALID_TOKEN,
    );
    surfaceFrame.trace(5, {emit});
    surfaceFrame.trace(INVALID_TOKEN, {emit});
    expect(emit).not.toHaveBeenCalled();
    expect(debug).toHaveBeenCalledTimes(2);
    debug.mockRestore();
  });
});

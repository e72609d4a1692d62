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

import {FatalError} from '../base/logging';
import {decodeJankMask, isJanky, jankMaskToString, JankType} from './jank_type';

describe('jankMaskToString', () => {
  test('None', () => {
    expect(jankMaskToString(JankType.None)).toBe('None');
  });

  test('single cause', () => {
    expect(jankMaskToString(JankType.PredictionError)).toBe('Prediction Error');
    expect(jankMaskToString(JankType.Unknown)).toBe('Unknown Jank');
  });

  test('several causes in bit order', () => {
    const mask = JankType.BufferStuffing | JankType.DisplayDriverLate;
    expect(jankMaskToString(mask)).toBe(
      'Display Driver Late, Buffer Stuffing',
    );
  });
});

describe('decodeJankMask', () => {
  test('splits a mask into causes', () => {
    expect(
      decodeJankMask(
        JankType.ProducerDeadlineMissed | JankType.CompositorScheduling,
      ),
    ).toEqual([JankType.ProducerDeadlineMissed, JankType.CompositorScheduling]);
    expect(decodeJankMask(JankType.None)).toEqual([]);
  });

  test('unknown bits are fatal', () => {
    expect(() => decodeJankMask(0x100 | JankType.Unknown)).toThrow(FatalError);
    expect(() => decodeJankMask(0x100)).toThrow(
      'Unrecognized jank type value 0x100',
    );
  });
});

test('isJanky', () => {
  expect(isJanky(JankType.None)).toBe(false);
  expect(isJanky(JankType.BufferStuffing)).toBe(true);
});

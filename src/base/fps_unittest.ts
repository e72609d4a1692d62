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

import {Fps} from './fps';

describe('Fps', () => {
  test('derives the vsync period', () => {
    expect(Fps.fromValue(60).period).toBe(16_666_666n);
    expect(Fps.fromValue(90).period).toBe(11_111_111n);
    expect(Fps.fromValue(120).period).toBe(8_333_333n);
  });

  test('round-trips through the period within the margin', () => {
    const fps = Fps.fromPeriod(Fps.fromValue(60).period);
    expect(fps.equalsWithMargin(Fps.fromValue(60))).toBe(true);
    expect(fps.intValue()).toBe(60);
  });

  test('non-positive rates are invalid', () => {
    expect(Fps.fromValue(0).isValid()).toBe(false);
    expect(Fps.fromValue(-30).isValid()).toBe(false);
    expect(Fps.fromPeriod(0n).isValid()).toBe(false);
    expect(Fps.INVALID.period).toBe(0n);
  });

  test('comparisons with margin', () => {
    const a = Fps.fromValue(60);
    const b = Fps.fromValue(60.0005);
    const c = Fps.fromValue(61);
    expect(a.equalsWithMargin(b)).toBe(true);
    expect(a.lessThanWithMargin(b)).toBe(false);
    expect(a.lessThanOrEqualWithMargin(b)).toBe(true);
    expect(a.lessThanWithMargin(c)).toBe(true);
    expect(c.greaterThanWithMargin(a)).toBe(true);
    expect(c.greaterThanOrEqualWithMargin(a)).toBe(true);
    expect(a.greaterThanOrEqualWithMargin(c)).toBe(false);
  });

  test('toString', () => {
    expect(Fps.fromValue(90).toString()).toBe('90.00fps');
  });

  test('compare sorts ascending', () => {
    const rates = [Fps.fromValue(90), Fps.fromValue(30), Fps.fromValue(60)];
    rates.sort(Fps.compare);
    expect(rates.map((fps) => fps.value)).toEqual([30, 60, 90]);
  });
});

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

import {Duration, Time} from './time';

describe('Time', () => {
  test('fromMillis', () => {
    expect(Time.fromMillis(16)).toBe(16_000_000n);
    expect(Time.fromMillis(1.5)).toBe(1_500_000n);
  });

  test('toMillis', () => {
    expect(Time.toMillis(Time.fromRaw(26_000_000n))).toBe(26);
  });

  test('isSet', () => {
    expect(Time.isSet(Time.ZERO)).toBe(false);
    expect(Time.isSet(Time.fromRaw(1n))).toBe(true);
  });

  test('arithmetic', () => {
    const t = Time.fromRaw(100n);
    expect(Time.add(t, 20n)).toBe(120n);
    expect(Time.sub(t, 20n)).toBe(80n);
    expect(Time.diff(t, Time.fromRaw(130n))).toBe(-30n);
    expect(Time.min(t, Time.fromRaw(50n))).toBe(50n);
    expect(Time.max(t, Time.fromRaw(50n))).toBe(100n);
  });
});

describe('Duration', () => {
  test('abs and max', () => {
    expect(Duration.abs(-5n)).toBe(5n);
    expect(Duration.abs(5n)).toBe(5n);
    expect(Duration.max(-5n, 0n)).toBe(0n);
  });

  test('formatMillis', () => {
    expect(Duration.formatMillis(16_666_666n, 2)).toBe('16.67');
    expect(Duration.formatMillis(10_000_000n, 6)).toBe('10.000000');
    expect(Duration.formatMillis(0n, 2)).toBe('0.00');
  });
});

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

export type Brand<T, B extends string> = T & {readonly __brand: B};

// The |time| type represents a reading of the monotonic clock in nanoseconds.
// Timestamps handed in by the compositor, by producers and by present fences
// all live in this domain.
export type time = Brand<bigint, 'time'>;

// The |duration| type is the distance between two |time|s.
export type duration = bigint;

const TIME_UNITS_PER_MILLISEC = 1e6;

export class Time {
  // Zero is never a valid reading, so it is used to mark a timestamp that has
  // not been set yet.
  static readonly ZERO = Time.fromRaw(0n);

  // Cast a bigint to a |time|. It's up to the caller to ensure the value is in
  // nanoseconds on the monotonic clock.
  static fromRaw(v: bigint): time {
    return v as time;
  }

  // Note: number -> BigInt conversion truncates below a nanosecond.
  static fromMillis(millis: number): time {
    return Time.fromRaw(BigInt(Math.floor(millis * TIME_UNITS_PER_MILLISEC)));
  }

  // Warning: lossy for very large values.
  static toMillis(t: time): number {
    return Number(t) / TIME_UNITS_PER_MILLISEC;
  }

  static isSet(t: time): boolean {
    return t !== 0n;
  }

  static add(t: time, d: duration): time {
    return Time.fromRaw(t + d);
  }

  static sub(t: time, d: duration): time {
    return Time.fromRaw(t - d);
  }

  static diff(a: time, b: time): duration {
    return a - b;
  }

  static min(a: time, b: time): time {
    return a < b ? a : b;
  }

  static max(a: time, b: time): time {
    return a > b ? a : b;
  }
}

export class Duration {
  static fromMillis(millis: number): duration {
    return BigInt(Math.floor(millis * TIME_UNITS_PER_MILLISEC));
  }

  static toMillis(d: duration): number {
    return Number(d) / TIME_UNITS_PER_MILLISEC;
  }

  static abs(d: duration): duration {
    return d < 0n ? -d : d;
  }

  static max(a: duration, b: duration): duration {
    return a > b ? a : b;
  }

  // Formats as fractional milliseconds, e.g. (16_666_666n, 2) -> '16.67'.
  static formatMillis(d: duration, fractionDigits: number): string {
    return Duration.toMillis(d).toFixed(fractionDigits);
  }
}

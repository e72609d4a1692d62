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

import {
  addErrorHandler,
  assertExists,
  assertFalse,
  assertTrue,
  ErrorDetails,
  fail,
  FatalError,
  removeErrorHandler,
  reportError,
} from './logging';

describe('assertExists', () => {
  test('returns value when not null or undefined', () => {
    expect(assertExists(42)).toBe(42);
    expect(assertExists(0)).toBe(0);
    expect(assertExists('')).toBe('');
  });

  test('throws on null', () => {
    expect(() => assertExists(null)).toThrow("`<expression>` doesn't exist");
  });

  test('includes description in error message', () => {
    expect(() => assertExists(undefined, 'display mode 3')).toThrow(
      "`display mode 3` doesn't exist",
    );
  });
});

describe('assertTrue', () => {
  test('does not throw when value is true', () => {
    expect(() => assertTrue(true)).not.toThrow();
  });

  test('throws a FatalError when value is false', () => {
    expect(() => assertTrue(false)).toThrow(FatalError);
    expect(() => assertTrue(false)).toThrow('Failed assertion');
  });

  test('uses custom message', () => {
    expect(() => assertTrue(false, 'threshold too large')).toThrow(
      'threshold too large',
    );
  });
});

describe('assertFalse', () => {
  test('throws when value is true', () => {
    expect(() => assertFalse(false)).not.toThrow();
    expect(() => assertFalse(true)).toThrow('Failed assertion');
  });
});

describe('error handlers', () => {
  test('fail() notifies handlers before throwing', () => {
    const handler = jest.fn<void, [ErrorDetails]>();
    addErrorHandler(handler);
    try {
      expect(() => fail('present state set twice')).toThrow(FatalError);
      expect(handler).toHaveBeenCalledTimes(1);
      expect(handler.mock.calls[0][0].message).toBe('present state set twice');
    } finally {
      removeErrorHandler(handler);
    }
  });

  test('handlers are registered once and can be removed', () => {
    const handler = jest.fn();
    addErrorHandler(handler);
    addErrorHandler(handler);
    reportError(new Error('boom'));
    expect(handler).toHaveBeenCalledTimes(1);

    removeErrorHandler(handler);
    reportError(new Error('boom'));
    expect(handler).toHaveBeenCalledTimes(1);
  });

  test('parses stack frames', () => {
    const err = new Error('Error: bad mask');
    err.stack = [
      'Error: bad mask',
      '    at decodeJankMask (/src/jank_type.ts:10:5)',
      '    at /src/main.ts:3:1',
    ].join('\n');
    const handler = jest.fn<void, [ErrorDetails]>();
    addErrorHandler(handler);
    try {
      reportError(err);
    } finally {
      removeErrorHandler(handler);
    }
    expect(handler).toHaveBeenCalledWith({
      message: 'bad mask',
      stack: [
        {name: 'decodeJankMask', location: '/src/jank_type.ts:10:5'},
        {name: '', location: '/src/main.ts:3:1'},
      ],
    });
  });

  test('reports non-Error values', () => {
    const handler = jest.fn<void, [ErrorDetails]>();
    addErrorHandler(handler);
    try {
      reportError('plain string');
    } finally {
      removeErrorHandler(handler);
    }
    expect(handler).toHaveBeenCalledWith({message: 'plain string', stack: []});
  });
});

test('FatalError carries its class name', () => {
  const err = new FatalError('oops');
  expect(err.name).toBe('FatalError');
  expect(err).toBeInstanceOf(Error);
});

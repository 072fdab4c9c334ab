import { describe, it, expect } from 'vitest';
import { httpStatusFor } from './error.js';
import {
  DeviceNotFoundError,
  InvalidCommandArgumentError,
  MalformedMessageError,
  MirrorUnavailableError,
} from '../utils/errors.js';

describe('httpStatusFor', () => {
  it('maps bridge errors by code', () => {
    expect(httpStatusFor(new MalformedMessageError('bad payload'))).toBe(400);
    expect(httpStatusFor(new InvalidCommandArgumentError('bad volume'))).toBe(400);
    expect(httpStatusFor(new DeviceNotFoundError('desk-pc'))).toBe(404);
    expect(httpStatusFor(new MirrorUnavailableError('media_player.desk', 'destroyed'))).toBe(409);
  });

  it('falls back for everything else', () => {
    expect(httpStatusFor(new Error('connection lost'))).toBe(500);
    expect(httpStatusFor(new Error('connection lost'), 502)).toBe(502);
    expect(httpStatusFor('not an error', 502)).toBe(502);
  });
});

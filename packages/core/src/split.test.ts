import { describe, it, expect } from 'vitest';
import {
  parseQualityPreset,
  parseSplitSide,
  cropFilter,
  hasExpectedDimensions,
  aspectRatio,
} from './split.js';
import { InvalidQualityError, InvalidSideError } from './errors/index.js';
import { CAPABILITIES, CAPABILITY_PREFERENCE, isSupportedOnPlatform } from './encoders.js';

describe('parseQualityPreset', () => {
  it('accepts names case-insensitively', () => {
    expect(parseQualityPreset('HIGH')).toBe('high');
    expect(parseQualityPreset(' Medium ')).toBe('medium');
    expect(parseQualityPreset('lossless')).toBe('lossless');
  });

  it('rejects unknown presets with the valid options listed', () => {
    expect(() => parseQualityPreset('ultra')).toThrow(InvalidQualityError);
    expect(() => parseQualityPreset('ultra')).toThrow(
      'Invalid quality preset: ultra. Valid options: lossless, high, medium'
    );
  });
});

describe('parseSplitSide', () => {
  it('accepts left and right', () => {
    expect(parseSplitSide('Left')).toBe('left');
    expect(parseSplitSide('RIGHT')).toBe('right');
  });

  it('rejects anything else', () => {
    expect(() => parseSplitSide('middle')).toThrow(InvalidSideError);
  });
});

describe('cropFilter', () => {
  it('crops the left half at the origin', () => {
    expect(cropFilter('left')).toBe('crop=1920:1080:0:0');
  });

  it('crops the right half offset by 1920', () => {
    expect(cropFilter('right')).toBe('crop=1920:1080:1920:0');
  });
});

describe('video geometry', () => {
  it('expects 3840x1080', () => {
    expect(hasExpectedDimensions({ width: 3840, height: 1080 })).toBe(true);
    expect(hasExpectedDimensions({ width: 1920, height: 1080 })).toBe(false);
  });

  it('reduces the aspect ratio', () => {
    expect(aspectRatio({ width: 3840, height: 1080 })).toBe('32:9');
    expect(aspectRatio({ width: 1920, height: 1080 })).toBe('16:9');
  });
});

describe('capabilities', () => {
  it('ends the preference list with the software fallback', () => {
    expect(CAPABILITY_PREFERENCE[0]).toBe('videotoolbox');
    expect(CAPABILITY_PREFERENCE[CAPABILITY_PREFERENCE.length - 1]).toBe('software');
    expect(CAPABILITIES.software.hardware).toBe(false);
  });

  it('only attempts VideoToolbox on macOS', () => {
    expect(isSupportedOnPlatform('videotoolbox', 'darwin')).toBe(true);
    expect(isSupportedOnPlatform('videotoolbox', 'linux')).toBe(false);
    expect(isSupportedOnPlatform('nvenc', 'win32')).toBe(true);
  });
});

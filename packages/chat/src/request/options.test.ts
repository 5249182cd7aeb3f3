import { describe, it, expect } from 'vitest';
import { InvalidInputError } from '@tipchat/llm';
import { validateOptions } from './options.js';

describe('validateOptions', () => {
  it('returns empty options for undefined', () => {
    expect(validateOptions(undefined)).toEqual({ options: {}, warnings: [] });
  });

  it('keeps documented and unknown keys as given', () => {
    const result = validateOptions({
      temperature: 0.2,
      max_tokens: 64,
      stop: ['\n'],
      logprobs: true,
      response_format: { type: 'json_object' },
    });

    expect(result.options).toEqual({
      temperature: 0.2,
      max_tokens: 64,
      stop: ['\n'],
      logprobs: true,
      response_format: { type: 'json_object' },
    });
    expect(result.warnings).toEqual([]);
  });

  it('accepts a null stop', () => {
    expect(validateOptions({ stop: null }).options).toEqual({ stop: null });
  });

  it('rejects a wrongly typed known option', () => {
    expect(() => validateOptions({ temperature: 'hot' })).toThrow(InvalidInputError);
    expect(() => validateOptions({ stream: 'yes' })).toThrow(InvalidInputError);
    expect(() => validateOptions({ logit_bias: { '50256': 'never' } })).toThrow(InvalidInputError);
  });

  it('names the offending key', () => {
    expect(() => validateOptions({ max_tokens: '10' })).toThrow(
      'Invalid options: max_tokens: Expected number, received string',
    );
  });

  it('rejects non-object options', () => {
    expect(() => validateOptions([1, 2])).toThrow(InvalidInputError);
    expect(() => validateOptions(null)).toThrow(InvalidInputError);
  });

  it('warns about out-of-range values without rejecting them', () => {
    const result = validateOptions({ temperature: 3, n: 0, top_p: 0.5 });

    expect(result.options).toEqual({ temperature: 3, n: 0, top_p: 0.5 });
    expect(result.warnings).toEqual([
      'temperature: Number must be less than or equal to 2',
      'n: Number must be greater than or equal to 1',
    ]);
  });

  it('warns about fractional counts', () => {
    expect(validateOptions({ max_tokens: 1.5 }).warnings).toEqual([
      'max_tokens: Expected integer, received float',
    ]);
  });
});

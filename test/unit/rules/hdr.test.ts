import { describe, it, expect } from 'vitest';
import { HdrCompatibilityRule } from '../../../src/rules/hdr.js';
import { makeClient, makeMedia } from '../../helpers/fixtures.js';

describe('HdrCompatibilityRule', () => {
  const rule = new HdrCompatibilityRule();

  it('requires tone-mapping for HDR10 in a browser', () => {
    const result = rule.evaluate(makeClient('web-browser'), makeMedia({ videoRangeType: 'HDR10' }));

    expect(result?.ruleName).toBe('HDR:Web:ToneMapRequired');
    expect(result?.severity).toBe('require');
    expect(result?.directPlay).toBe('deny');
    expect(result?.transcoding).toBe('allow');
    expect(result?.rationale).toBe('Web browsers cannot display HDR10. Transcode with tone-mapping to SDR required.');
  });

  it('distinguishes Dolby Vision from other HDR formats', () => {
    const dv = rule.evaluate(makeClient('roku'), makeMedia({ videoRangeType: 'DOVIWithHDR10' }));
    const hdr10 = rule.evaluate(makeClient('roku'), makeMedia({ videoRangeType: 'HDR10' }));

    expect(dv?.ruleName).toBe('HDR:Roku:DolbyVision');
    expect(dv?.severity).toBe('recommend');
    expect(hdr10).toBeNull();
  });

  it('uses suggest severity on Apple phones', () => {
    expect(rule.evaluate(makeClient('apple-mobile'), makeMedia({ videoRangeType: 'HLG' }))?.severity).toBe('suggest');
  });

  it('falls back to the generic Dolby Vision suggestion', () => {
    const result = rule.evaluate(makeClient('unknown'), makeMedia({ videoRangeType: 'DOVI' }));
    expect(result?.ruleName).toBe('HDR:Generic:DolbyVision');
    expect(result?.severity).toBe('suggest');
  });

  it('has no opinion for full HDR pipelines or SDR content', () => {
    expect(rule.evaluate(makeClient('apple-tv'), makeMedia({ videoRangeType: 'DOVI' }))).toBeNull();
    expect(rule.evaluate(makeClient('desktop'), makeMedia({ videoRangeType: 'HDR10' }))).toBeNull();
    expect(rule.evaluate(makeClient('web-browser'), makeMedia({ videoRangeType: 'SDR' }))).toBeNull();
    expect(rule.evaluate(makeClient('web-browser'), makeMedia())).toBeNull();
  });
});

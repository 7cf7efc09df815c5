import { describe, it, expect } from 'vitest';
import { ContainerCodecCompatibilityRule } from '../../../src/rules/container-codec.js';
import { makeClient, makeMedia } from '../../helpers/fixtures.js';

describe('ContainerCodecCompatibilityRule', () => {
  const rule = new ContainerCodecCompatibilityRule();

  it('requires a remux for mkv on web browsers', () => {
    const result = rule.evaluate(makeClient('web-browser'), makeMedia({ videoCodec: 'h264', container: 'mkv' }));

    expect(result).toEqual({
      ruleName: 'Web:UnsupportedContainer',
      directPlay: 'deny',
      directStream: 'allow',
      transcoding: 'abstain',
      severity: 'require',
      rationale: "Web browsers cannot natively play 'mkv' containers. Remux required.",
    });
  });

  it('recommends a transcode for HEVC in a web-friendly container', () => {
    const result = rule.evaluate(makeClient('web-browser'), makeMedia({ videoCodec: 'HEVC', container: 'mp4' }));

    expect(result?.ruleName).toBe('Web:HevcLimited');
    expect(result?.severity).toBe('recommend');
    expect(result?.directPlay).toBe('deny');
    expect(result?.directStream).toBe('abstain');
    expect(result?.transcoding).toBe('allow');
  });

  it('flags mkv on Roku before the HEVC container check', () => {
    const result = rule.evaluate(makeClient('roku'), makeMedia({ videoCodec: 'hevc', container: 'mkv' }));
    expect(result?.ruleName).toBe('Roku:MkvNotSupported');
  });

  it('flags HEVC outside MP4/M4V/MOV on Roku', () => {
    const result = rule.evaluate(makeClient('roku'), makeMedia({ videoCodec: 'hevc', container: 'ts' }));

    expect(result?.ruleName).toBe('Roku:HevcContainerMismatch');
    expect(result?.rationale).toBe("Roku only supports HEVC in MP4/M4V/MOV containers, not 'ts'.");
  });

  it('allows HEVC in mp4 on Roku', () => {
    expect(rule.evaluate(makeClient('roku'), makeMedia({ videoCodec: 'hevc', container: 'mp4' }))).toBeNull();
  });

  it('uses recommend severity for Apple and Xbox containers', () => {
    const apple = rule.evaluate(makeClient('apple-tv'), makeMedia({ videoCodec: 'h264', container: 'avi' }));
    const xbox = rule.evaluate(makeClient('xbox'), makeMedia({ videoCodec: 'h264', container: 'webm' }));

    expect(apple?.ruleName).toBe('Apple:UnsupportedContainer');
    expect(apple?.severity).toBe('recommend');
    expect(xbox?.ruleName).toBe('Xbox:LimitedContainerSupport');
    expect(xbox?.severity).toBe('recommend');
  });

  it('requires a remux for mkv on DLNA renderers', () => {
    const result = rule.evaluate(makeClient('dlna'), makeMedia({ videoCodec: 'h264', container: 'mkv' }));
    expect(result?.ruleName).toBe('DLNA:IncompatibleContainer');
    expect(result?.severity).toBe('require');
  });

  it('has no opinion for clients without container restrictions', () => {
    expect(rule.evaluate(makeClient('desktop'), makeMedia({ videoCodec: 'hevc', container: 'mkv' }))).toBeNull();
    expect(rule.evaluate(makeClient('unknown'), makeMedia({ videoCodec: 'hevc', container: 'mkv' }))).toBeNull();
  });

  it('has no opinion when container or codec is missing', () => {
    expect(rule.evaluate(makeClient('web-browser'), makeMedia({ container: 'mkv' }))).toBeNull();
    expect(rule.evaluate(makeClient('web-browser'), makeMedia({ videoCodec: 'h264' }))).toBeNull();
  });
});

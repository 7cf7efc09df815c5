import { describe, it, expect } from 'vitest';
import { DecisionEngine } from '../../../src/decision/engine.js';
import { defaultPolicy, isDefaultPolicy } from '../../../src/models/policy.js';
import { finding, type PlaybackRule } from '../../../src/rules/types.js';
import { CLIENT_CATEGORIES, type ClientProfile, type MediaCharacteristics } from '../../../src/models/types.js';
import { ACTIVE_SETTINGS, makeClient, makeMedia } from '../../helpers/fixtures.js';

function lines(reasoning: string): string[] {
  return reasoning.split('\n');
}

describe('DecisionEngine', () => {
  describe('fast exit', () => {
    it('returns the default policy in conservative observe-only mode', () => {
      const engine = new DecisionEngine({
        settings: { enableDynamicPolicies: false, conservativeMode: true },
      });
      const policy = engine.computePolicy(
        makeClient('web-browser', { codecConfidence: { hevc: 0.2 } }),
        makeMedia({ videoCodec: 'hevc', container: 'mkv' }),
      );

      expect(policy).toEqual(defaultPolicy());
    });

    it('still computes when dynamic shaping is on, even in conservative mode', () => {
      const engine = new DecisionEngine({
        settings: { enableDynamicPolicies: true, conservativeMode: true },
      });
      const policy = engine.computePolicy(makeClient(), makeMedia({ videoCodec: 'h264' }));

      expect(isDefaultPolicy(policy)).toBe(false);
    });
  });

  describe('rule findings', () => {
    it('remuxes MKV for a browser and reports every step', () => {
      const engine = new DecisionEngine({ settings: ACTIVE_SETTINGS });
      const policy = engine.computePolicy(
        makeClient('web-browser', { codecConfidence: { hevc: 0.2 } }),
        makeMedia({ videoCodec: 'hevc', container: 'mkv' }),
      );

      expect(policy.allowDirectPlay).toBe(false);
      expect(policy.allowDirectStream).toBe(true);
      expect(policy.allowTranscoding).toBe(true);
      expect(policy.bitrateCap).toBeUndefined();
      expect(policy.confidence).toBeCloseTo(0.55, 10);
      expect(lines(policy.reasoning)).toEqual([
        "[Rule:Web:UnsupportedContainer] Web browsers cannot natively play 'mkv' containers. Remux required.",
        "Video codec 'hevc' confidence 0.20 — codec likely unsupported, allowing transcode.",
        "Container 'mkv' — no confidence data, deferring.",
        'Transcode cost: LOW — lightweight transcode, no significant server impact.',
      ]);
    });

    it('keeps a required dimension pinned against confidence refinements', () => {
      const engine = new DecisionEngine({ settings: ACTIVE_SETTINGS });
      const policy = engine.computePolicy(
        makeClient('roku', { codecConfidence: { hevc: 0.9 } }),
        makeMedia({ videoCodec: 'hevc', container: 'mkv' }),
      );

      expect(policy.allowDirectPlay).toBe(false);
      expect(policy.allowDirectStream).toBe(true);
      expect(policy.confidence).toBeCloseTo(0.85, 10);
      expect(lines(policy.reasoning).slice(0, 3)).toEqual([
        '[Rule:Roku:MkvNotSupported] Roku cannot natively play MKV containers. Remux to MP4/HLS required.',
        "Video codec 'hevc' confidence 0.90 — favoring direct play.",
        'Direct play stays disallowed — required by Roku:MkvNotSupported.',
      ]);
    });

    it('warns when direct play is off and the transcode is extreme', () => {
      const engine = new DecisionEngine({ settings: ACTIVE_SETTINGS });
      const policy = engine.computePolicy(
        makeClient('web-browser', { codecConfidence: { hevc: 0.2 } }),
        makeMedia({
          videoCodec: 'hevc',
          container: 'mp4',
          width: 3840,
          height: 2160,
          videoRangeType: 'HDR10',
          videoBitDepth: 10,
        }),
      );

      expect(policy.allowDirectPlay).toBe(false);
      expect(policy.confidence).toBeCloseTo(0.65, 10);
      expect(lines(policy.reasoning).slice(-2)).toEqual([
        'Transcode cost: EXTREME — strongly prefer direct play if possible.',
        'WARNING: Direct play disallowed but transcode will be very expensive.',
      ]);
    });

    it('skips a rule that throws and keeps the others', () => {
      const broken: PlaybackRule = {
        name: 'Broken',
        evaluate: () => {
          throw new Error('boom');
        },
      };
      const denyAll: PlaybackRule = {
        name: 'DenyAll',
        evaluate: () => finding({
          ruleName: 'DenyAll',
          severity: 'require',
          rationale: 'Nothing plays directly.',
          directPlay: 'deny',
        }),
      };
      const engine = new DecisionEngine({ settings: ACTIVE_SETTINGS, rules: [broken, denyAll] });

      expect(engine.evaluateRules(makeClient(), makeMedia())).toHaveLength(1);

      const policy = engine.computePolicy(makeClient(), makeMedia({ videoCodec: 'h264' }));
      expect(policy.allowDirectPlay).toBe(false);
      expect(lines(policy.reasoning)[0]).toBe('[Rule:DenyAll] Nothing plays directly.');
    });
  });

  describe('confidence refinement', () => {
    it('favors direct play at high video confidence', () => {
      const engine = new DecisionEngine({ settings: ACTIVE_SETTINGS });
      const policy = engine.computePolicy(
        makeClient('unknown', { codecConfidence: { h264: 0.9 } }),
        makeMedia({ videoCodec: 'h264' }),
      );

      expect(policy.allowDirectPlay).toBe(true);
      expect(policy.confidence).toBeCloseTo(0.7, 10);
      expect(lines(policy.reasoning)[0]).toBe("Video codec 'h264' confidence 0.90 — favoring direct play.");
    });

    it('turns off direct play when the video codec is likely unsupported', () => {
      const engine = new DecisionEngine({ settings: ACTIVE_SETTINGS });
      const policy = engine.computePolicy(
        makeClient('unknown', { codecConfidence: { vp9: 0.1 }, containerConfidence: { mp4: 0.9 } }),
        makeMedia({ videoCodec: 'vp9', container: 'mp4' }),
      );

      expect(policy.allowDirectPlay).toBe(false);
      expect(policy.allowDirectStream).toBe(true);
      expect(policy.allowTranscoding).toBe(true);
      expect(policy.confidence).toBeCloseTo(0.5, 10);
      expect(lines(policy.reasoning)).toContain("Container 'mp4' confidence 0.90 — no remux needed.");
    });

    it('defers to host defaults when confidence falls below the low threshold', () => {
      const engine = new DecisionEngine({ settings: ACTIVE_SETTINGS });
      const policy = engine.computePolicy(
        makeClient('unknown', { codecConfidence: { vp9: 0.1, ac3: 0.1 } }),
        makeMedia({ videoCodec: 'vp9', audioCodec: 'ac3' }),
      );

      expect(policy).toEqual(defaultPolicy());
    });

    it('prefers direct stream with an audio-only transcode when it is cheap', () => {
      const engine = new DecisionEngine({ settings: ACTIVE_SETTINGS });
      const policy = engine.computePolicy(
        makeClient('unknown', { codecConfidence: { h264: 0.9, ac3: 0.2 } }),
        makeMedia({ videoCodec: 'h264', audioCodec: 'ac3', container: 'mkv' }),
      );

      expect(policy.allowDirectPlay).toBe(true);
      expect(policy.allowDirectStream).toBe(true);
      expect(policy.allowTranscoding).toBe(true);
      expect(policy.confidence).toBeCloseTo(0.65, 10);
      expect(lines(policy.reasoning)).toEqual([
        "Video codec 'h264' confidence 0.90 — favoring direct play.",
        "Audio codec 'ac3' confidence 0.20 — audio transcode likely required.",
        'Audio-only transcode is cheap — direct stream with audio transcode preferred over full video transcode.',
        "Container 'mkv' — no confidence data, deferring.",
        'Transcode cost: REMUX only — container remux is cheap, direct stream is fine.',
      ]);
    });

    it('allows everything when the media has no video codec', () => {
      const engine = new DecisionEngine({ settings: ACTIVE_SETTINGS });
      const policy = engine.computePolicy(makeClient(), makeMedia());

      expect(policy.allowDirectPlay).toBe(true);
      expect(policy.allowDirectStream).toBe(true);
      expect(policy.allowTranscoding).toBe(true);
      expect(policy.confidence).toBe(0.5);
      expect(lines(policy.reasoning)[0]).toBe('No video codec info available — allowing all methods.');
    });

    it('looks up confidence case-insensitively', () => {
      const engine = new DecisionEngine({ settings: ACTIVE_SETTINGS });
      const policy = engine.computePolicy(
        makeClient('unknown', { codecConfidence: { h264: 0.9 } }),
        makeMedia({ videoCodec: 'H264' }),
      );

      expect(policy.confidence).toBeCloseTo(0.7, 10);
    });
  });

  describe('bitrate', () => {
    const client = makeClient('android-mobile', { codecConfidence: { h264: 0.95 }, maxBitrate: 5_000_000 });
    const media = makeMedia({ videoCodec: 'h264', bitrate: 10_000_000 });

    it('caps at the lower of the rule cap and the client ceiling', () => {
      const engine = new DecisionEngine({ settings: ACTIVE_SETTINGS });
      const policy = engine.computePolicy(client, media);

      expect(policy.bitrateCap).toBe(5_000_000);
      expect(policy.allowTranscoding).toBe(true);
      expect(lines(policy.reasoning)).toContain(
        '[Rule:BitrateCap:AndroidMobile] Media bitrate 10.0 Mbps exceeds AndroidMobile default cap of 8.0 Mbps.',
      );
      expect(lines(policy.reasoning)).toContain(
        'Media bitrate 10.0 Mbps exceeds cap 5.0 Mbps — transcode may be needed.',
      );
    });

    it('uses the global override in place of the client ceiling', () => {
      const engine = new DecisionEngine({
        settings: { ...ACTIVE_SETTINGS, globalMaxBitrateOverride: 6_000_000 },
      });

      expect(engine.computePolicy(client, media).bitrateCap).toBe(6_000_000);
    });

    it('picks up new settings after updateSettings', () => {
      const engine = new DecisionEngine({ settings: ACTIVE_SETTINGS });
      engine.updateSettings({ enableDynamicPolicies: false, conservativeMode: true });

      expect(engine.computePolicy(client, media)).toEqual(defaultPolicy());
    });
  });

  it('never mutates its inputs', () => {
    const engine = new DecisionEngine({ settings: ACTIVE_SETTINGS });
    const client = makeClient('roku', { codecConfidence: { hevc: 0.9 } });
    const media = makeMedia({ videoCodec: 'hevc', container: 'mkv', bitrate: 30_000_000 });
    const clientBefore = structuredClone(client);
    const mediaBefore = structuredClone(media);

    engine.computePolicy(client, media);

    expect(client).toEqual(clientBefore);
    expect(media).toEqual(mediaBefore);
  });

  describe('across client categories and media shapes', () => {
    const mediaShapes: MediaCharacteristics[] = [
      {},
      makeMedia(),
      makeMedia({ videoCodec: 'h264' }),
      makeMedia({ audioCodec: 'aac' }),
      makeMedia({ container: 'mkv' }),
      makeMedia({ videoCodec: 'hevc', container: 'mkv', videoRangeType: 'HDR10', videoBitDepth: 10 }),
      makeMedia({ videoCodec: 'hevc', container: 'mp4', videoRangeType: 'DOVIWithHDR10', videoBitDepth: 12 }),
      makeMedia({ videoCodec: 'av1', videoRangeType: 'HLG', videoBitDepth: 10, width: 7680, height: 4320 }),
      makeMedia({ videoCodec: 'h264', audioCodec: 'truehd', audioChannels: 8, hasImageSubtitles: true }),
      makeMedia({ videoCodec: 'vp9', container: 'webm', bitrate: 0 }),
      makeMedia({ videoCodec: 'hevc', container: 'ts', bitrate: 1_000_000_000 }),
      makeMedia({ videoCodec: 'mpeg2video', container: 'avi', bitrate: -1, width: 0, height: 0 }),
    ];
    const clientShapes: Partial<Omit<ClientProfile, 'deviceId' | 'category'>>[] = [
      {},
      { codecConfidence: { h264: 0, hevc: 0, av1: 0 }, containerConfidence: { mkv: 0 } },
      { codecConfidence: { h264: 1, hevc: 1, av1: 1, truehd: 1 }, containerConfidence: { mkv: 1, mp4: 1 } },
      { maxBitrate: 1 },
    ];

    it.each(CLIENT_CATEGORIES)('always returns a policy with confidence in [0, 1] for %s', (category) => {
      const engine = new DecisionEngine({ settings: { ...ACTIVE_SETTINGS, globalMaxBitrateOverride: 2_000_000 } });

      for (const clientShape of clientShapes) {
        for (const media of mediaShapes) {
          const policy = engine.computePolicy(makeClient(category, clientShape), media);

          expect(policy.confidence).toBeGreaterThanOrEqual(0);
          expect(policy.confidence).toBeLessThanOrEqual(1);
          expect(Number.isFinite(policy.confidence)).toBe(true);
        }
      }
    });
  });
});

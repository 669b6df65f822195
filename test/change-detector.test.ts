import { describe, it, expect } from 'vitest';
import { ChangeDetector } from '../src/session/change-detector.js';

describe('ChangeDetector', () => {
  it('fires once per distinct fingerprint transition', () => {
    const detector = new ChangeDetector('fp-a', 'https://polls.example.test/room');

    expect(detector.observe('fp-a')).toBe(false);
    expect(detector.observe('fp-b')).toBe(true);
    expect(detector.observe('fp-b')).toBe(false);
    expect(detector.observe('fp-a')).toBe(true);
  });

  it('ignores empty fingerprints without forgetting the last good one', () => {
    const detector = new ChangeDetector('fp-a', '');

    expect(detector.observe('')).toBe(false);
    expect(detector.fingerprint).toBe('fp-a');
    expect(detector.observe('fp-a')).toBe(false);
    expect(detector.observe('')).toBe(false);
    expect(detector.observe('fp-b')).toBe(true);
    expect(detector.fingerprint).toBe('fp-b');
  });

  it('detects a change against an empty initial read', () => {
    const detector = new ChangeDetector('', '');
    expect(detector.observe('fp-a')).toBe(true);
  });

  it('reports location changes separately', () => {
    const detector = new ChangeDetector('fp-a', 'https://polls.example.test/room');

    expect(detector.observeLocation('https://polls.example.test/room')).toBe(false);
    expect(detector.observeLocation('https://polls.example.test/other')).toBe(true);
    expect(detector.observeLocation('https://polls.example.test/other')).toBe(false);
    expect(detector.observeLocation('')).toBe(false);
    expect(detector.location).toBe('https://polls.example.test/other');
  });
});

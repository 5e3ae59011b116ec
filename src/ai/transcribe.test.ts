import { describe, it, expect } from 'vitest';
import { transcribeWordTimings, wordsFromTranscript } from './transcribe.js';
import { CaptionTimingError } from '../pipeline/errors.js';

describe('wordsFromTranscript', () => {
  it('uses word timings when the transcript has them', () => {
    const words = wordsFromTranscript(
      {
        text: 'hi there',
        words: [
          { word: ' hi', start: 0, end: 0.3 },
          { word: 'there', start: 0.3 },
          { word: '  ' },
        ],
      },
      'ignored',
    );
    expect(words).toEqual([
      { text: 'hi', start: 0, end: 0.3 },
      { text: 'there', start: 0.3, end: 0.5 },
    ]);
  });

  it('spreads the recognised text over the last segment end when words are missing', () => {
    const words = wordsFromTranscript({ text: 'a b c', segments: [{ end: 2 }, { end: '3' }] }, 'reference');
    expect(words).toEqual([
      { text: 'a', start: 0, end: 1 },
      { text: 'b', start: 1, end: 2 },
      { text: 'c', start: 2, end: 3 },
    ]);
  });

  it('falls back to the reference text', () => {
    expect(wordsFromTranscript({}, 'x y')).toEqual([
      { text: 'x', start: 0, end: 0.4 },
      { text: 'y', start: 0.4, end: 0.8 },
    ]);
  });

  it('rejects payloads of the wrong shape', () => {
    expect(() => wordsFromTranscript('plain text', '')).toThrow(CaptionTimingError);
    expect(() => wordsFromTranscript({ words: 'none' }, '')).toThrow(CaptionTimingError);
  });
});

describe('transcribeWordTimings', () => {
  it('fails before calling the API when the audio file is missing', async () => {
    await expect(transcribeWordTimings('/nonexistent/narration.mp3', 'text')).rejects.toThrow(
      'Audio file not found: /nonexistent/narration.mp3',
    );
  });
});

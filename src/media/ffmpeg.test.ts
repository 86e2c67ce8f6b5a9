import { CANONICAL_PROFILE } from '../config.js';
import {
  attachAudioArgs,
  burnCaptionsArgs,
  concatArgs,
  concatAudioArgs,
  concatListContent,
  fitVideoArgs,
  mixAudioArgs,
  normalizeArgs,
  padAudioArgs,
  seconds,
  silenceArgs,
} from './ffmpeg.js';

const AUDIO_OUT = ['-c:a', 'aac', '-b:a', '192k', '-ar', '48000', '-ac', '2'];
const VIDEO_OUT = ['-c:v', 'libx264', '-preset', 'veryfast', '-crf', '18'];

describe('ffmpeg argument builders', () => {
  it('formats milliseconds as seconds with three decimals', () => {
    expect(seconds(4000)).toBe('4.000');
    expect(seconds(1234)).toBe('1.234');
  });

  it('pads audio with silence to the exact target', () => {
    expect(padAudioArgs('speech.mp3', 4000, 'padded.m4a')).toEqual([
      '-i', 'speech.mp3', '-af', 'apad=whole_dur=4.000', '-t', '4.000', ...AUDIO_OUT, 'padded.m4a',
    ]);
  });

  it('attaches audio by mapping, never mixing, and copies video when no hold is needed', () => {
    const args = attachAudioArgs({ videoPath: 'v.mp4', audioPath: 'a.m4a', durationMs: 4000, holdLastFrameMs: 0, outputPath: 'o.mp4' });
    expect(args).toEqual([
      '-i', 'v.mp4', '-i', 'a.m4a', '-map', '0:v:0', '-map', '1:a:0', '-c:v', 'copy', ...AUDIO_OUT, '-t', '4.000', 'o.mp4',
    ]);
    expect(args.join(' ')).not.toContain('amix');
  });

  it('holds the last frame when the video is shorter than the target', () => {
    const args = attachAudioArgs({ videoPath: 'v.mp4', audioPath: 'a.m4a', durationMs: 6500, holdLastFrameMs: 1500, outputPath: 'o.mp4' });
    expect(args.slice(8, 10)).toEqual(['-vf', 'tpad=stop_mode=clone:stop_duration=1.500']);
    expect(args.slice(10, 16)).toEqual(VIDEO_OUT);
  });

  it('mixes into an existing audio stream with amix', () => {
    expect(mixAudioArgs({ videoPath: 'v.mp4', audioPath: 'a.m4a', durationMs: 4000, holdLastFrameMs: 0, outputPath: 'o.mp4' })).toEqual([
      '-i', 'v.mp4', '-i', 'a.m4a',
      '-filter_complex', '[0:a:0][1:a:0]amix=inputs=2:duration=longest:normalize=0[aout]',
      '-map', '0:v:0', '-map', '[aout]', '-c:v', 'copy', ...AUDIO_OUT, '-t', '4.000', 'o.mp4',
    ]);
  });

  it('routes held video through the filter graph when mixing', () => {
    const args = mixAudioArgs({ videoPath: 'v.mp4', audioPath: 'a.m4a', durationMs: 5000, holdLastFrameMs: 250, outputPath: 'o.mp4' });
    expect(args[5]).toBe('[0:a:0][1:a:0]amix=inputs=2:duration=longest:normalize=0[aout];[0:v:0]tpad=stop_mode=clone:stop_duration=0.250[vout]');
    expect(args.slice(6, 10)).toEqual(['-map', '[vout]', '-map', '[aout]']);
  });

  it('fits video length and drops audio', () => {
    expect(fitVideoArgs('in.mp4', 4000, 0, 'out.mp4')).toEqual([
      '-i', 'in.mp4', '-map', '0:v:0', '-c:v', 'copy', '-an', '-t', '4.000', 'out.mp4',
    ]);
  });

  it('normalizes with cover-scale, crop and explicit colour tags', () => {
    expect(normalizeArgs('in.mp4', CANONICAL_PROFILE, 'out.mp4')).toEqual([
      '-i', 'in.mp4',
      '-vf', 'scale=1080:1920:force_original_aspect_ratio=increase,crop=1080:1920,setsar=1,format=yuv420p',
      ...VIDEO_OUT,
      '-pix_fmt', 'yuv420p', '-color_range', 'tv', '-colorspace', 'bt709', '-color_trc', 'bt709', '-color_primaries', 'bt709',
      ...AUDIO_OUT,
      'out.mp4',
    ]);
  });

  it('writes a concat list with quoted absolute paths', () => {
    expect(concatListContent(['/w/a.mp4', "/w/it's.mp4"])).toBe("file '/w/a.mp4'\nfile '/w/it'\\''s.mp4'\n");
    expect(concatArgs('/w/list.txt', '/w/out.mp4')).toEqual(['-f', 'concat', '-safe', '0', '-i', '/w/list.txt', '-c', 'copy', '/w/out.mp4']);
  });

  it('joins audio through the concat filter', () => {
    expect(concatAudioArgs(['a.mp3', 'b.mp3'], 'ab.m4a')).toEqual([
      '-i', 'a.mp3', '-i', 'b.mp3',
      '-filter_complex', '[0:a:0][1:a:0]concat=n=2:v=0:a=1[aout]',
      '-map', '[aout]', ...AUDIO_OUT, 'ab.m4a',
    ]);
  });

  it('generates stereo silence', () => {
    expect(silenceArgs(2500, 's.m4a')).toEqual(['-f', 'lavfi', '-i', 'anullsrc=r=48000:cl=stereo', '-t', '2.500', ...AUDIO_OUT, 's.m4a']);
  });

  it('burns captions with an escaped subtitles path and keeps the audio', () => {
    const args = burnCaptionsArgs('in.mp4', '/w/run:1/final.ass', CANONICAL_PROFILE, 'out.mp4');
    expect(args.slice(0, 4)).toEqual(['-i', 'in.mp4', '-vf', 'subtitles=/w/run\\:1/final.ass']);
    expect(args.slice(-3)).toEqual(['-c:a', 'copy', 'out.mp4']);
  });
});

import { describe, it, expect } from 'vitest';
import {
  isDeviceContentionOutput,
  isModeListed,
  parseDeviceList,
  parseDeviceModes,
  parseEncoderList,
} from '../EngineOutputParser.js';

const DSHOW_MODES = [
  '[dshow @ 0000020a] DirectShow video device options (from video devices)',
  '[dshow @ 0000020a]  Pin "Capture" (alternative pin name "0")',
  '[dshow @ 0000020a]   vcodec=mjpeg  min s=1920x1080 fps=5 max s=1920x1080 fps=30',
  '[dshow @ 0000020a]   pixel_format=yuyv422  min s=640x480 fps=5 max s=640x480 fps=29.97',
  '[dshow @ 0000020a]   vcodec=mjpeg  min s=1920x1080 fps=5 max s=1920x1080 fps=30',
].join('\n');

const V4L2_MODES = [
  '[video4linux2,v4l2 @ 0x5581] Raw       :     yuyv422 :           YUYV 4:2:2 : 640x480 1280x720',
  '[video4linux2,v4l2 @ 0x5581] Compressed:       mjpeg :          Motion-JPEG : 1920x1080 1280x720',
].join('\n');

describe('parseEncoderList', () => {
  it('エンコーダ名を取り出し、凡例行は無視する', () => {
    const encoders = parseEncoderList(
      [
        'Encoders:',
        ' V..... = Video',
        ' ------',
        ' V....D libx264              libx264 H.264 / AVC / MPEG-4 AVC',
        ' V....D h264_nvenc           NVIDIA NVENC H.264 encoder (codec h264)',
        ' A....D aac                  AAC (Advanced Audio Coding)',
      ].join('\n')
    );

    expect([...encoders]).toEqual(['libx264', 'h264_nvenc', 'aac']);
  });
});

describe('parseDeviceModes', () => {
  it('dshow の max 側を重複なしで取り出す', () => {
    expect(parseDeviceModes(DSHOW_MODES)).toEqual([
      { width: 1920, height: 1080, frameRate: 30 },
      { width: 640, height: 480, frameRate: 29.97 },
    ]);
  });

  it('v4l2 の解像度をフレームレート不明として取り出す', () => {
    expect(parseDeviceModes(V4L2_MODES)).toEqual([
      { width: 640, height: 480, frameRate: 0 },
      { width: 1280, height: 720, frameRate: 0 },
      { width: 1920, height: 1080, frameRate: 0 },
    ]);
  });

  it('読み取れなければ空', () => {
    expect(parseDeviceModes('Unknown input format')).toEqual([]);
  });
});

describe('isModeListed', () => {
  it('解像度のみ・解像度とフレームレートで判定する', () => {
    expect(isModeListed(DSHOW_MODES, 640, 480, null)).toBe(true);
    expect(isModeListed(DSHOW_MODES, 1920, 1080, 30)).toBe(true);
    expect(isModeListed(DSHOW_MODES, 1920, 1080, 60)).toBe(false);
    expect(isModeListed(DSHOW_MODES, 3840, 2160, null)).toBe(false);
  });
});

describe('parseDeviceList', () => {
  it('dshow のデバイス名を種類ごとに取り出す', () => {
    const text = [
      '[dshow @ 000001] "Integrated Camera" (video)',
      '[dshow @ 000001]   Alternative name "@device_pnp_usb_vid_0001"',
      '[dshow @ 000001] "Microphone (Realtek Audio)" (audio)',
    ].join('\n');

    expect(parseDeviceList(text, 'dshow', 'video')).toEqual([
      { id: 'Integrated Camera', displayName: 'Integrated Camera' },
    ]);
    expect(parseDeviceList(text, 'dshow', 'audio')).toEqual([
      { id: 'Microphone (Realtek Audio)', displayName: 'Microphone (Realtek Audio)' },
    ]);
  });

  it('avfoundation はインデックスを識別子にする', () => {
    const text = [
      '[AVFoundation indev @ 0x7f9] AVFoundation video devices:',
      '[AVFoundation indev @ 0x7f9] [0] FaceTime HD Camera',
      '[AVFoundation indev @ 0x7f9] [1] Capture screen 0',
      '[AVFoundation indev @ 0x7f9] AVFoundation audio devices:',
      '[AVFoundation indev @ 0x7f9] [0] Built-in Microphone',
    ].join('\n');

    expect(parseDeviceList(text, 'avfoundation', 'video')).toEqual([
      { id: '0', displayName: 'FaceTime HD Camera' },
      { id: '1', displayName: 'Capture screen 0' },
    ]);
    expect(parseDeviceList(text, 'avfoundation', 'audio')).toEqual([
      { id: '0', displayName: 'Built-in Microphone' },
    ]);
  });

  it('v4l2 は -sources の出力を読む', () => {
    const text = [
      'Auto-detected sources for v4l2:',
      '  /dev/video0 [Integrated Camera]',
      '* hw:CARD=PCH,DEV=0 [HDA Intel PCH]',
    ].join('\n');

    expect(parseDeviceList(text, 'v4l2', 'video')).toEqual([
      { id: '/dev/video0', displayName: 'Integrated Camera' },
      { id: 'hw:CARD=PCH,DEV=0', displayName: 'HDA Intel PCH' },
    ]);
  });
});

describe('isDeviceContentionOutput', () => {
  it('デバイス使用中のメッセージを検出する', () => {
    expect(isDeviceContentionOutput(['[dshow @ 0001] Could not run graph (sometimes caused by a device already in use)'])).toBe(true);
    expect(isDeviceContentionOutput(['/dev/video0: Device or resource busy'])).toBe(true);
    expect(isDeviceContentionOutput(['Unknown encoder', 'Conversion failed!'])).toBe(false);
  });
});

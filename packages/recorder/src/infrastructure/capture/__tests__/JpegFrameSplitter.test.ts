import { describe, it, expect } from 'vitest';
import { JpegFrameSplitter } from '../JpegFrameSplitter.js';

function collect() {
  const frames: number[][] = [];
  const splitter = new JpegFrameSplitter((frame) => frames.push([...frame]));
  return { frames, splitter };
}

describe('JpegFrameSplitter', () => {
  it('1つのチャンクに含まれる複数フレームを切り出す', () => {
    const { frames, splitter } = collect();

    splitter.push(Uint8Array.from([0xff, 0xd8, 0x01, 0xff, 0xd9, 0xff, 0xd8, 0x02, 0xff, 0xd9]));

    expect(frames).toEqual([
      [0xff, 0xd8, 0x01, 0xff, 0xd9],
      [0xff, 0xd8, 0x02, 0xff, 0xd9],
    ]);
    expect(splitter.pendingBytes()).toBe(0);
  });

  it('チャンクをまたぐフレームを組み立てる', () => {
    const { frames, splitter } = collect();

    splitter.push(Uint8Array.from([0x00, 0xff]));
    splitter.push(Uint8Array.from([0xd8, 0x01, 0x02]));
    expect(frames).toEqual([]);
    expect(splitter.pendingBytes()).toBe(4);

    splitter.push(Uint8Array.from([0x03, 0xff, 0xd9, 0xff]));

    expect(frames).toEqual([[0xff, 0xd8, 0x01, 0x02, 0x03, 0xff, 0xd9]]);
    expect(splitter.pendingBytes()).toBe(1);
  });

  it('SOI より前のバイトは捨てる', () => {
    const { frames, splitter } = collect();

    splitter.push(Uint8Array.from([0x10, 0x20, 0xff, 0xd8, 0xff, 0xd9]));

    expect(frames).toEqual([[0xff, 0xd8, 0xff, 0xd9]]);
  });

  it('上限を超えた未完成フレームは捨てて同期し直す', () => {
    const frames: number[][] = [];
    const splitter = new JpegFrameSplitter((frame) => frames.push([...frame]), 4);

    splitter.push(Uint8Array.from([0xff, 0xd8, 0x01, 0x02, 0x03]));
    expect(splitter.pendingBytes()).toBe(0);

    splitter.push(Uint8Array.from([0xff, 0xd8, 0xff, 0xd9]));
    expect(frames).toEqual([[0xff, 0xd8, 0xff, 0xd9]]);
  });
});

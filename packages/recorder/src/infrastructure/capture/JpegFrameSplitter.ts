const SOI = Buffer.from([0xff, 0xd8]);
const EOI = Buffer.from([0xff, 0xd9]);

/** 1フレームとして扱う最大サイズ（これを超えたら読み捨てて同期し直す） */
const DEFAULT_MAX_BUFFER_BYTES = 16 * 1024 * 1024;

/**
 * 連続したJPEGのバイト列（image2pipe の出力）をフレーム単位に切り出す
 *
 * SOI (FF D8) から EOI (FF D9) までを1フレームとする
 * 渡すフレームはコールバック中のみ有効
 */
export class JpegFrameSplitter {
  private buffer: Buffer = Buffer.alloc(0);

  constructor(
    private readonly onFrame: (frame: Uint8Array) => void,
    private readonly maxBufferBytes: number = DEFAULT_MAX_BUFFER_BYTES
  ) {}

  push(chunk: Uint8Array): void {
    this.buffer = this.buffer.length > 0 ? Buffer.concat([this.buffer, chunk]) : Buffer.from(chunk);

    for (;;) {
      const start = this.buffer.indexOf(SOI);
      if (start < 0) {
        // 末尾の FF は次のチャンクの D8 と組み合わさる可能性がある
        const last = this.buffer.length - 1;
        this.buffer = last >= 0 && this.buffer[last] === 0xff ? this.buffer.subarray(last) : Buffer.alloc(0);
        return;
      }

      const end = this.buffer.indexOf(EOI, start + SOI.length);
      if (end < 0) {
        this.buffer = this.buffer.subarray(start);
        if (this.buffer.length > this.maxBufferBytes) {
          console.warn(`⚠️ [Preview] Frame exceeded ${this.maxBufferBytes} bytes, resynchronizing`);
          this.buffer = Buffer.alloc(0);
        }
        return;
      }

      this.onFrame(this.buffer.subarray(start, end + EOI.length));
      this.buffer = this.buffer.subarray(end + EOI.length);
    }
  }

  reset(): void {
    this.buffer = Buffer.alloc(0);
  }

  /**
   * 未完成のフレームとして保持しているバイト数
   */
  pendingBytes(): number {
    return this.buffer.length;
  }
}

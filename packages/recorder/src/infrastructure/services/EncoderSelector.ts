import { ENCODER_PROFILES, HARDWARE_ENCODER_ORDER } from '@booth-capture/common-types';
import type { EncoderCandidate, HardwareEncoder } from '@booth-capture/common-types';
import type { EngineIntrospection } from './EngineIntrospection.js';

export interface EncoderSelectionOptions {
  preferHardware: boolean;
  useLowCompressionFallback: boolean;
}

/**
 * EncoderSelector
 *
 * 1. 低圧縮指定なら mjpeg、ハードウェア優先でなければ x264
 * 2. エンジンに組み込まれていて、このマシンで意味のあるアクセラレータを優先順に並べる
 * 3. 順に試験エンコードし、最初に成功したものを使う
 * 4. すべて失敗したら x264
 */
export class EncoderSelector {
  constructor(
    private readonly introspection: EngineIntrospection,
    private readonly platform: NodeJS.Platform = process.platform
  ) {}

  async select(enginePath: string, options: EncoderSelectionOptions): Promise<EncoderCandidate> {
    if (options.useLowCompressionFallback) {
      console.log('🎛️ [EncoderSelector] Low-compression output requested, using mjpeg');
      return 'mjpeg';
    }
    if (!options.preferHardware) {
      return 'x264';
    }

    const compiledIn = await this.introspection.listEncoders(enginePath);
    const candidates = this.relevantAccelerators().filter((encoder) =>
      compiledIn.has(ENCODER_PROFILES[encoder].codec)
    );

    if (candidates.length === 0) {
      console.log('🎛️ [EncoderSelector] No hardware encoder compiled in, using x264');
      return 'x264';
    }

    for (const encoder of candidates) {
      if (await this.introspection.probeEncoder(enginePath, encoder)) {
        console.log(`✅ [EncoderSelector] Using hardware encoder: ${encoder}`);
        return encoder;
      }
      console.log(`⏭️ [EncoderSelector] ${encoder} not usable, trying next`);
    }

    console.log('🎛️ [EncoderSelector] No hardware encoder usable, falling back to x264');
    return 'x264';
  }

  /**
   * macOS では NVENC / QSV / AMF のいずれも利用できない
   */
  private relevantAccelerators(): readonly HardwareEncoder[] {
    return this.platform === 'darwin' ? [] : HARDWARE_ENCODER_ORDER;
  }
}

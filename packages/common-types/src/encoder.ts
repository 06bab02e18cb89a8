/**
 * 録画に使うビデオエンコーダ
 * - nvenc / qsv / amf: ハードウェアアクセラレータ（優先順）
 * - x264: ソフトウェアのベースライン
 * - mjpeg: 低圧縮フォールバック（ファイルは巨大だがCPU負荷はほぼゼロ）
 */
export type EncoderCandidate = 'nvenc' | 'qsv' | 'amf' | 'x264' | 'mjpeg';

export type HardwareEncoder = Extract<EncoderCandidate, 'nvenc' | 'qsv' | 'amf'>;

/**
 * エンコーダごとのコーデック・品質・プリセット
 */
export interface EncoderProfile {
  /** エンジンに渡すコーデック名 */
  codec: string;
  quality: readonly string[];
  preset: readonly string[];
  hardware: boolean;
}

export const ENCODER_PROFILES: Readonly<Record<EncoderCandidate, EncoderProfile>> = {
  nvenc: { codec: 'h264_nvenc', quality: ['-cq', '21'], preset: ['-preset', 'p4'], hardware: true },
  qsv: { codec: 'h264_qsv', quality: ['-global_quality', '21'], preset: ['-preset', 'veryfast'], hardware: true },
  amf: { codec: 'h264_amf', quality: ['-rc', 'cqp', '-qp_i', '20', '-qp_p', '22'], preset: ['-quality', 'speed'], hardware: true },
  x264: { codec: 'libx264', quality: ['-crf', '20'], preset: ['-preset', 'veryfast'], hardware: false },
  mjpeg: { codec: 'mjpeg', quality: ['-q:v', '3'], preset: [], hardware: false },
};

/** ハードウェア優先時の試行順 */
export const HARDWARE_ENCODER_ORDER: readonly HardwareEncoder[] = ['nvenc', 'qsv', 'amf'];

import { describe, it, expect } from 'vitest';
import { EncoderSelector } from '../EncoderSelector.js';
import { EngineIntrospection } from '../EngineIntrospection.js';
import { FakeProcessLauncher } from '../../../__tests__/helpers/fakeEngine.js';
import type { FakeEngineBehavior } from '../../../__tests__/helpers/fakeEngine.js';

const ENCODER_LISTING = [
  'Encoders:',
  ' V..... = Video',
  ' ------',
  ' V....D libx264              libx264 H.264 / AVC / MPEG-4 AVC / MPEG-4 part 10 (codec h264)',
  ' V....D h264_nvenc           NVIDIA NVENC H.264 encoder (codec h264)',
  ' V....D h264_qsv             H.264 / AVC / MPEG-4 AVC / MPEG-4 part 10 (Intel Quick Sync Video acceleration) (codec h264)',
  ' V....D mjpeg                MJPEG (Motion JPEG)',
];

/**
 * -encoders には一覧を返し、試験エンコードは usable に含まれるコーデックだけ成功させる
 */
function engineWith(listing: string[], usable: string[]) {
  return new FakeProcessLauncher((_command, args): FakeEngineBehavior => {
    if (args.includes('-encoders')) {
      return { output: listing, exitAfterSpawn: 0 };
    }
    const codec = args[args.indexOf('-c:v') + 1];
    return { output: usable.includes(codec) ? [] : [`[${codec} @ 0x1] No capable devices found`], exitAfterSpawn: usable.includes(codec) ? 0 : 1 };
  });
}

function createSelector(launcher: FakeProcessLauncher, platform: NodeJS.Platform = 'linux') {
  const introspection = new EngineIntrospection(launcher, { inputFormat: 'v4l2', audioInputFormat: 'alsa' }, 5000);
  return new EncoderSelector(introspection, platform);
}

const HARDWARE = { preferHardware: true, useLowCompressionFallback: false };

describe('EncoderSelector', () => {
  it('ハードウェア優先でなければエンジンに問い合わせずに x264', async () => {
    const launcher = engineWith(ENCODER_LISTING, ['h264_nvenc']);

    const encoder = await createSelector(launcher).select('ffmpeg', {
      preferHardware: false,
      useLowCompressionFallback: false,
    });

    expect(encoder).toBe('x264');
    expect(launcher.launched).toHaveLength(0);
  });

  it('低圧縮指定なら mjpeg', async () => {
    const launcher = engineWith(ENCODER_LISTING, []);

    const encoder = await createSelector(launcher).select('ffmpeg', {
      preferHardware: true,
      useLowCompressionFallback: true,
    });

    expect(encoder).toBe('mjpeg');
    expect(launcher.launched).toHaveLength(0);
  });

  it('試験エンコードに成功した最初のアクセラレータを選ぶ', async () => {
    const launcher = engineWith(ENCODER_LISTING, ['h264_qsv']);

    const encoder = await createSelector(launcher).select('ffmpeg', HARDWARE);

    expect(encoder).toBe('qsv');
    const probedCodecs = launcher.launched.slice(1).map((p) => p.args[p.args.indexOf('-c:v') + 1]);
    // h264_amf は組み込まれていないので試さない
    expect(probedCodecs).toEqual(['h264_nvenc', 'h264_qsv']);
  });

  it('すべての試験エンコードが失敗したら x264', async () => {
    const launcher = engineWith(ENCODER_LISTING, []);

    const encoder = await createSelector(launcher).select('ffmpeg', HARDWARE);

    expect(encoder).toBe('x264');
    expect(launcher.launched).toHaveLength(3);
  });

  it('アクセラレータが組み込まれていなければ試験エンコードせずに x264', async () => {
    const launcher = engineWith([' V....D libx264              libx264 H.264'], ['h264_nvenc']);

    const encoder = await createSelector(launcher).select('ffmpeg', HARDWARE);

    expect(encoder).toBe('x264');
    expect(launcher.launched).toHaveLength(1);
  });

  it('macOS ではアクセラレータを試さない', async () => {
    const launcher = engineWith(ENCODER_LISTING, ['h264_nvenc']);

    const encoder = await createSelector(launcher, 'darwin').select('ffmpeg', HARDWARE);

    expect(encoder).toBe('x264');
    expect(launcher.launched).toHaveLength(1);
  });

  it('エンジンが見つからなければ一覧は空として x264', async () => {
    const launcher = new FakeProcessLauncher(() => ({
      spawnError: Object.assign(new Error('spawn ffmpeg ENOENT'), { code: 'ENOENT' }),
    }));

    const encoder = await createSelector(launcher).select('ffmpeg', HARDWARE);

    expect(encoder).toBe('x264');
  });
});

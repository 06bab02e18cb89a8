/**
 * CLI: キャプチャデバイスとエンコーダの診断
 *
 * Usage: npx tsx src/cli/diagnose.ts [cameraId]
 *
 * - エンジンのデバイス一覧をそのまま表示
 * - cameraId を指定するとモード一覧と解釈後のケイパビリティを表示
 * - 設定から選ばれるエンコーダを表示
 */
import dotenv from 'dotenv';
import { getRecorderConfig } from '../infrastructure/config/recorderConfig.js';
import { NodeProcessLauncher } from '../infrastructure/engine/NodeProcessLauncher.js';
import { EncoderSelector } from '../infrastructure/services/EncoderSelector.js';
import { EngineIntrospection } from '../infrastructure/services/EngineIntrospection.js';

dotenv.config();

async function main(): Promise<void> {
  const cameraId = process.argv[2];
  const config = getRecorderConfig();
  const introspection = new EngineIntrospection(
    new NodeProcessLauncher(),
    { inputFormat: config.inputFormat, audioInputFormat: config.audioInputFormat },
    config.probeTimeoutMs
  );

  console.log(`🔧 Engine: ${config.enginePath} (input: ${config.inputFormat})`);

  for (const kind of ['video', 'audio'] as const) {
    console.log(`\n📋 ${kind} devices:`);
    for (const line of await introspection.listDevicesRaw(config.enginePath, kind)) {
      console.log(`  ${line}`);
    }
    for (const device of await introspection.listDevices(config.enginePath, kind)) {
      console.log(`  -> ${device.id} (${device.displayName})`);
    }
  }

  if (cameraId) {
    console.log(`\n📋 Modes for ${cameraId}:`);
    for (const line of await introspection.listModesRaw(config.enginePath, cameraId)) {
      console.log(`  ${line}`);
    }
    for (const capability of await introspection.listCapabilities(config.enginePath, cameraId)) {
      console.log(`  -> ${capability.width}x${capability.height} @ ${capability.frameRate || 'default'}`);
    }
  }

  const encoder = await new EncoderSelector(introspection).select(config.enginePath, {
    preferHardware: config.preferHardwareEncoder,
    useLowCompressionFallback: config.useLowCompressionFallbackCodec,
  });
  console.log(`\n✅ Encoder: ${encoder}`);
}

main().catch((err) => {
  console.error('Error:', err);
  process.exit(1);
});

import crypto from 'crypto';

export const DEFAULT_VOICE_POOL: readonly string[] = [
  'en-GB-RyanNeural',
  'en-US-GuyNeural',
  'en-AU-WilliamNeural',
  'en-IN-PrabhatNeural',
  'en-GB-ThomasNeural',
  'en-US-ChristopherNeural',
  'en-AU-NatashaNeural',
  'en-GB-SoniaNeural',
];

/**
 * Stable callsign -> TTS voice mapping.
 * MD5 of the UTF-8 callsign read as a 128-bit integer, modulo the pool size.
 * No per-process seed, so the mapping is identical across runs.
 */
export function assignVoice(id: string, pool: readonly string[] = DEFAULT_VOICE_POOL): string {
  if (pool.length === 0) {
    throw new Error('Voice pool must contain at least one voice');
  }
  const digest = crypto.createHash('md5').update(id, 'utf8').digest('hex');
  const index = Number(BigInt(`0x${digest}`) % BigInt(pool.length));
  return pool[index];
}

export default assignVoice;

import { runCommand } from './exec.js';

/**
 * Encodes an RGBA8 buffer with ffmpeg; the container and codec follow the
 * extension of `outputPath` (".png" for a still image).
 */
export const encodeImage = async (
  ffmpeg: string,
  rgba: Uint8ClampedArray,
  width: number,
  height: number,
  outputPath: string,
): Promise<void> => {
  const expectedBytes = width * height * 4;
  if (rgba.byteLength !== expectedBytes) {
    throw new RangeError(
      `encodeImage expected ${expectedBytes} bytes for ${width}x${height}, received ${rgba.byteLength}`,
    );
  }
  const args = [
    '-v',
    'error',
    '-y',
    '-f',
    'rawvideo',
    '-pix_fmt',
    'rgba',
    '-s',
    `${width}x${height}`,
    '-i',
    '-',
    '-frames:v',
    '1',
    outputPath,
  ];
  await runCommand(ffmpeg, args, new Uint8Array(rgba.buffer, rgba.byteOffset, rgba.byteLength));
};

/** Binary PPM (P6) bytes from an RGBA8 buffer; alpha is dropped. */
export const encodePpm = (pixels: Uint8ClampedArray, width: number, height: number): Uint8Array => {
  if (pixels.length !== width * height * 4) {
    throw new RangeError(
      `encodePpm expected ${width * height * 4} bytes for ${width}x${height}, received ${pixels.length}`,
    );
  }
  const header = `P6\n${width} ${height}\n255\n`;
  const headerBytes = new TextEncoder().encode(header);
  const rgb = new Uint8Array(width * height * 3);
  for (let i = 0, j = 0; i < pixels.length; i += 4, j += 3) {
    rgb[j + 0] = pixels[i + 0];
    rgb[j + 1] = pixels[i + 1];
    rgb[j + 2] = pixels[i + 2];
  }
  const combined = new Uint8Array(headerBytes.length + rgb.length);
  combined.set(headerBytes, 0);
  combined.set(rgb, headerBytes.length);
  return combined;
};

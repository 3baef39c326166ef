import { PNG } from 'pngjs';

export function solidPng(rgb: [number, number, number], width = 2, height = 2): Buffer {
  const png = new PNG({ width, height });
  for (let index = 0; index < width * height; index += 1) {
    const offset = index * 4;
    png.data[offset] = rgb[0];
    png.data[offset + 1] = rgb[1];
    png.data[offset + 2] = rgb[2];
    png.data[offset + 3] = 255;
  }
  return PNG.sync.write(png);
}

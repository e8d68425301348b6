/**
 * Magic numbers and marker bytes read by the header parser
 */
export const MAGIC = {
  /** JPEG SOI, read as one big-endian 16-bit value */
  JPEG: 0xffd8,
  /** "\x89PNG" as a 32-bit value */
  PNG: 0x89504e47,
  /** "GIF" as a 24-bit value */
  GIF: 0x474946,
  /** "MM" */
  TIFF_MOTOROLA: 0x4d4d,
  /** "II" */
  TIFF_INTEL: 0x4949,
} as const;

export const FILE_SIGNATURES = {
  JPEG_SOI: new Uint8Array([0xff, 0xd8]),
  EXIF_PREAMBLE: new Uint8Array([0x45, 0x78, 0x69, 0x66, 0x00, 0x00]), // Exif\0\0
} as const;

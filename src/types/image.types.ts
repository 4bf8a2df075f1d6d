/**
 * Image types - Upload formats and probed metadata
 */

export type ImageFormat = "jpeg" | "png" | "heic";

export interface ImageInfo {
  format: ImageFormat;
  width?: number;
  height?: number;
}

import { PNG } from "pngjs";
import { errorMessage } from "@tabrunner/schemas";
import { UnknownProtocolResultError } from "../errors.js";
import { truncateDiagnostic } from "../retry/waiter.js";

/** Turns the base64 payload of a screenshot into an image value. */
export type ImageDecoder<T> = (base64: string) => T;

export interface DecodedImage {
  format: "png";
  width: number;
  height: number;
  /** Encoded PNG bytes, as captured. */
  data: Buffer;
  /** RGBA pixels, row-major. */
  pixels: Buffer;
}

export const decodePng: ImageDecoder<DecodedImage> = (base64) => {
  const data = Buffer.from(base64, "base64");
  try {
    const png = PNG.sync.read(data);
    return { format: "png", width: png.width, height: png.height, data, pixels: png.data };
  } catch (err: unknown) {
    throw new UnknownProtocolResultError(
      truncateDiagnostic(base64),
      `Screenshot is not a valid PNG (${errorMessage(err)})`,
    );
  }
};

import type { ProtocolConfig } from "../interfaces/config.ts";
import type { EncodedImage } from "../../processing/types.ts";

/**
 * Builder for the image data payload streamed after SEND_IMAGE
 */
export class PayloadBuilder {
  constructor(private config: ProtocolConfig) {}

  /**
   * Concatenate the encoded rows top to bottom and, when the protocol
   * expects it, reverse the whole byte sequence
   *
   * Reversal flips pixel order and the byte order inside each RGB565 word,
   * so the device receives big-endian pixels starting from the bottom-right.
   *
   * @param image Encoded image
   * @returns New buffer; the image rows are left untouched
   */
  public buildImagePayload(image: EncodedImage): Buffer {
    const payload = Buffer.concat(image.rows);
    if (this.config.reversePayload) {
      payload.reverse();
    }
    return payload;
  }
}

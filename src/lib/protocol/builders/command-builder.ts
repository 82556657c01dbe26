import {
  CMD_SEND_IMAGE,
  SEND_IMAGE_COMMAND_LENGTH,
  SEND_IMAGE_FORMAT_WORD,
} from "../constants.ts";
import { ConfigurationError } from "../../utils/errors.ts";

/**
 * Builder for the projector's command frames
 */
export class CommandBuilder {
  /**
   * Build the SEND_IMAGE command announcing an image upload
   *
   * - Byte 0: opcode (0x01)
   * - Bytes 1-3: zero
   * - Bytes 4-5: data frame size, little-endian
   * - Bytes 6-7: format word (0x0002), little-endian
   *
   * @param frameSize Size of the data frames that will follow
   */
  public static buildSendImage(frameSize: number): Buffer {
    if (!Number.isInteger(frameSize) || frameSize <= 0 || frameSize > 0xffff) {
      throw new ConfigurationError(
        `Frame size must be an integer between 1 and 65535, got ${frameSize}`,
      );
    }

    const command = Buffer.alloc(SEND_IMAGE_COMMAND_LENGTH);
    command.writeUInt8(CMD_SEND_IMAGE, 0);
    command.writeUInt16LE(frameSize, 4);
    command.writeUInt16LE(SEND_IMAGE_FORMAT_WORD, 6);
    return command;
  }
}

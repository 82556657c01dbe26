/**
 * Textual responses the projector sends as notifications
 *
 * The device has no per-frame acknowledgment. It only answers the
 * SEND_IMAGE command and, sometimes, the end of an image.
 */
export enum ResponseStatus {
  /**
   * Device accepted SEND_IMAGE and is ready for image data
   */
  OK = "OK",

  /**
   * Device finished rendering the received image
   *
   * Frequently never sent even when the image appears, so its absence is
   * not treated as a failure.
   */
  DONE = "Done",
}

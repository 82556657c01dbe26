import { useState, useEffect, useRef, useCallback } from "react";
import { BleTransport } from "../lib/ble/ble-client.ts";
import {
  SketcherUploader,
  type UploadResult,
} from "../lib/core/sketcher-uploader.ts";
import { logger, LogEventType } from "../lib/utils/logger.ts";
import { describeError, ExitCode, exitCodeFor } from "../lib/utils/errors.ts";
import type { ConnectionStep } from "../components/index.ts";
import { failActiveStep, updateStepStatus } from "../utils/app-utils.ts";
import { useConnectionSteps } from "./useConnectionSteps.ts";
import type { UploadJob } from "../cli/types.ts";

export type UploadStatus = "connecting" | "uploading" | "success" | "error";

const isComplete = (steps: ConnectionStep[], id: string) =>
  steps.some((step) => step.id === id && step.status === "complete");

export function useUpload(job: UploadJob) {
  const [status, setStatus] = useState<UploadStatus>("connecting");
  const [message, setMessage] = useState<string>("Initializing...");
  const [progress, setProgress] = useState<number>(0);
  const [frames, setFrames] = useState<{ sent: number; total: number }>({
    sent: 0,
    total: 0,
  });
  const [exitCode, setExitCode] = useState<ExitCode>(ExitCode.SUCCESS);
  const { connectionSteps, failConnectionStep } = useConnectionSteps();
  const controller = useRef(new AbortController());

  const [uploadSteps, setUploadSteps] = useState<ConnectionStep[]>([
    { id: "encode", label: "Encoding image", status: "pending" },
    { id: "command", label: "Sending upload command", status: "pending" },
    { id: "data", label: "Transferring image data", status: "pending" },
    { id: "complete", label: "Waiting for the projector", status: "pending" },
  ]);

  useEffect(() => {
    const unsubscribe = logger.onLog((entry) => {
      switch (entry.eventType) {
        case LogEventType.ENCODE_START:
          setUploadSteps((prev) => updateStepStatus(prev, "encode", "active"));
          break;

        case LogEventType.ENCODE_COMPLETE:
          setUploadSteps((prev) =>
            updateStepStatus(prev, "encode", "complete", "command"),
          );
          break;

        case LogEventType.DEVICE_READY:
          setUploadSteps((prev) =>
            updateStepStatus(prev, "command", "complete", "data"),
          );
          break;

        // The upload command goes through the same transfer; only the
        // transfer after "OK" counts as image data
        case LogEventType.DATA_SEND_COMPLETE:
          setUploadSteps((prev) =>
            isComplete(prev, "command")
              ? updateStepStatus(prev, "data", "complete", "complete")
              : prev,
          );
          break;
      }
    });

    return unsubscribe;
  }, []);

  /**
   * Stop scanning or connecting at once, or the transfer after the current frame
   */
  const cancel = useCallback(() => {
    controller.current.abort();
  }, []);

  useEffect(() => {
    const { signal } = controller.current;
    const onSigint = () => cancel();
    process.on("SIGINT", onSigint);

    const runUpload = async () => {
      const transport = new BleTransport(job.bleConfig);

      try {
        setStatus("connecting");
        setMessage("Connecting to smART Sketcher...");

        const device = await transport.open(signal);
        setMessage(`Connected to ${device.name || device.address}`);

        setStatus("uploading");
        setMessage(job.test ? "Uploading test pattern..." : "Uploading image...");

        const uploader = new SketcherUploader(
          transport,
          job.protocolConfig,
          job.imageConfig,
        );
        const uploadOptions = {
          signal,
          onProgress: (sent: number, total: number) => {
            setFrames({ sent, total });
            setProgress((sent / total) * 100);
          },
        };

        let result: UploadResult;
        if (job.test) {
          result = await uploader.uploadCheckerboard(undefined, uploadOptions);
        } else if (job.image) {
          result = await uploader.uploadImage(job.image, uploadOptions);
        } else {
          throw new Error("No image provided");
        }

        setUploadSteps((prev) => updateStepStatus(prev, "complete", "complete"));
        setStatus("success");
        setMessage(
          result.acknowledged
            ? "Upload completed successfully!"
            : "Upload sent, but the projector did not confirm it. Check the projector.",
        );
      } catch (error) {
        const description = describeError(error);
        failConnectionStep(description);
        setUploadSteps((prev) => failActiveStep(prev, description));
        setExitCode(exitCodeFor(error));
        setStatus("error");
        setMessage(description);
      } finally {
        await transport.disconnect();
      }
    };

    runUpload().catch((error: unknown) => {
      logger.error(`Upload aborted: ${error}`);
    });

    return () => {
      process.off("SIGINT", onSigint);
    };
  }, [job, cancel, failConnectionStep]);

  return {
    status,
    message,
    progress,
    frames,
    exitCode,
    cancel,
    uploadSteps,
    connectionSteps,
  };
}

import React, { useEffect } from "react";
import { Box, Text, useApp, useInput, useStdin } from "ink";
import { Header, UploadProgress, ConnectionStatus, LogWarnings } from "./index.ts";
import { useUpload } from "../hooks/useUpload.ts";
import { useLogWarnings } from "../hooks/useLogWarnings.ts";
import type { UploadJob } from "../cli/types.ts";

export interface UploadAppProps {
  job: UploadJob;
}

export const UploadApp: React.FC<UploadAppProps> = ({ job }) => {
  const { exit } = useApp();
  const { isRawModeSupported } = useStdin();
  const {
    status,
    message,
    progress,
    frames,
    exitCode,
    cancel,
    uploadSteps,
    connectionSteps,
  } = useUpload(job);
  const warnings = useLogWarnings();

  useInput(
    (input, key) => {
      if (key.ctrl && input === "c") {
        cancel();
      }
    },
    { isActive: isRawModeSupported },
  );

  // Exit the app when done
  useEffect(() => {
    if (status === "success" || status === "error") {
      // Give time for the final render, then exit
      const timer = setTimeout(() => {
        exit();
        // Force exit since noble keeps handles open
        process.exit(exitCode);
      }, 100);
      return () => clearTimeout(timer);
    }
  }, [status, exitCode, exit]);

  return (
    <Box flexDirection="column" padding={1}>
      <Header />

      {job.image && (
        <Box>
          <Text color="gray">Image: {job.image}</Text>
        </Box>
      )}

      {status === "connecting" && (
        <Box flexDirection="column">
          <UploadProgress status={status} message={message} />
          <ConnectionStatus steps={connectionSteps} />
        </Box>
      )}

      {status === "uploading" && (
        <Box flexDirection="column">
          <UploadProgress
            status={status}
            message={message}
            progress={progress}
            frames={frames}
          />
          <ConnectionStatus steps={uploadSteps} />
          <Box marginTop={1}>
            <Text color="dim">Press Ctrl+C to cancel</Text>
          </Box>
        </Box>
      )}

      {status === "success" && (
        <UploadProgress status={status} message={message} progress={progress} />
      )}

      {status === "error" && (
        <>
          <UploadProgress status={status} message={message} />
          <ConnectionStatus
            steps={
              connectionSteps.some((step) => step.status === "error")
                ? connectionSteps
                : uploadSteps
            }
          />
          <Box marginTop={1}>
            <Text color="red">Please check your device and try again.</Text>
          </Box>
        </>
      )}

      <LogWarnings warnings={warnings} />
    </Box>
  );
};

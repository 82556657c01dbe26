import React from "react";
import { Box, Text } from "ink";
import Spinner from "ink-spinner";
import type { UploadStatus } from "../hooks/useUpload.ts";

interface UploadProgressProps {
  status: UploadStatus;
  message?: string;
  progress?: number;
  frames?: { sent: number; total: number };
}

const ProgressBar: React.FC<{
  progress: number;
  frames?: { sent: number; total: number };
}> = ({ progress, frames }) => {
  const percentage = Math.round(progress);
  const barLength = 30;
  const filledLength = Math.round((progress / 100) * barLength);
  const filled = "█".repeat(filledLength);
  const empty = "░".repeat(barLength - filledLength);

  return (
    <Box marginTop={1}>
      <Text color="dim">[</Text>
      <Text color={percentage < 100 ? "cyan" : "green"}>{filled + empty}</Text>
      <Text color="dim">] {percentage}%</Text>
      {frames && frames.total > 0 && (
        <Text color="dim">
          {" "}
          ({frames.sent}/{frames.total} frames)
        </Text>
      )}
    </Box>
  );
};

const STATUS_COLORS: Record<UploadStatus, string> = {
  connecting: "cyan",
  uploading: "blue",
  success: "green",
  error: "red",
};

export const UploadProgress: React.FC<UploadProgressProps> = ({
  status,
  message,
  progress,
  frames,
}) => {
  const color = STATUS_COLORS[status];
  const statusIcon =
    status === "success" ? "✓" : status === "error" ? "✗" : null;

  return (
    <Box flexDirection="column" paddingY={1}>
      <Box>
        {statusIcon ? (
          <Text color={color}>{statusIcon}</Text>
        ) : (
          <Text color={color}>
            <Spinner type="dots" />
          </Text>
        )}
        <Box marginLeft={1}>
          <Text color={color} bold>
            {message || status.toUpperCase()}
          </Text>
        </Box>
      </Box>
      {progress !== undefined && status === "uploading" && (
        <ProgressBar progress={progress} frames={frames} />
      )}
    </Box>
  );
};

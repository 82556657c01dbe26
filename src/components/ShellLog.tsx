import { Box, Text } from "ink";
import type React from "react";
import type { ShellEntry, ShellEntryKind } from "../lib/shell/index.ts";

interface ShellLogProps {
  entries: ShellEntry[];
  /** Number of most recent entries to show */
  rows?: number;
}

const PREFIX: Record<ShellEntryKind, { mark: string; color: string }> = {
  input: { mark: ">", color: "white" },
  sent: { mark: "→", color: "gray" },
  notification: { mark: "←", color: "green" },
  info: { mark: " ", color: "cyan" },
  error: { mark: "!", color: "red" },
};

export const ShellLog: React.FC<ShellLogProps> = ({ entries, rows = 20 }) => {
  return (
    <Box flexDirection="column">
      {entries.slice(-rows).map((entry) => {
        const { mark, color } = PREFIX[entry.kind];
        return (
          <Text key={entry.id} color={color}>
            {mark} {entry.text}
          </Text>
        );
      })}
    </Box>
  );
};

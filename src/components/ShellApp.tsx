import React, { useEffect, useState } from "react";
import { Box, Text, useApp, useInput, useStdin } from "ink";
import Spinner from "ink-spinner";
import { Header, ConnectionStatus, ShellLog, LogWarnings } from "./index.ts";
import { useShell } from "../hooks/useShell.ts";
import { useLogWarnings } from "../hooks/useLogWarnings.ts";
import { logger } from "../lib/utils/logger.ts";
import type { ShellJob } from "../cli/types.ts";

export interface ShellAppProps {
  job: ShellJob;
}

export const ShellApp: React.FC<ShellAppProps> = ({ job }) => {
  const { exit } = useApp();
  const { isRawModeSupported } = useStdin();
  const { status, message, entries, exitCode, connectionSteps, submit, quit } =
    useShell(job);
  const warnings = useLogWarnings();
  const [line, setLine] = useState("");

  useInput(
    (input, key) => {
      if (key.ctrl && input === "c") {
        quit().catch((error: unknown) => logger.error(`Shutdown failed: ${error}`));
        return;
      }
      if (status !== "ready") {
        return;
      }
      if (key.return) {
        submit(line);
        setLine("");
      } else if (key.backspace || key.delete) {
        setLine((prev) => prev.slice(0, -1));
      } else if (input && !key.ctrl && !key.meta) {
        setLine((prev) => prev + input);
      }
    },
    { isActive: isRawModeSupported },
  );

  // Exit the app once the session is closed
  useEffect(() => {
    if (status === "closed" || status === "error") {
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
      <Header subtitle="Interactive command shell" />

      {status === "connecting" && (
        <Box flexDirection="column">
          <Box>
            <Text color="cyan">
              <Spinner type="dots" />
            </Text>
            <Text color="cyan" bold>
              {" "}
              {message}
            </Text>
          </Box>
          <ConnectionStatus steps={connectionSteps} />
        </Box>
      )}

      {status !== "connecting" && status !== "error" && (
        <Box flexDirection="column">
          <Text color="gray">{message}</Text>
          <ShellLog entries={entries} />
        </Box>
      )}

      {status === "ready" && (
        <Box>
          <Text color="cyan" bold>
            {"sketcher> "}
          </Text>
          <Text>{line}</Text>
          <Text inverse> </Text>
        </Box>
      )}

      {status === "closing" && <Text color="gray">Disconnecting...</Text>}

      <LogWarnings warnings={warnings} />

      {status === "error" && (
        <Box flexDirection="column">
          <Text color="red" bold>
            ✗ {message}
          </Text>
          <ShellLog entries={entries} rows={5} />
          <ConnectionStatus steps={connectionSteps} />
        </Box>
      )}
    </Box>
  );
};

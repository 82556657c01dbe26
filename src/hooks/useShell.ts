import { useState, useEffect, useRef, useCallback } from "react";
import { BleTransport } from "../lib/ble/ble-client.ts";
import { ShellConnection, type ShellEntry } from "../lib/shell/index.ts";
import { logger } from "../lib/utils/logger.ts";
import { describeError, ExitCode, exitCodeFor } from "../lib/utils/errors.ts";
import { useConnectionSteps } from "./useConnectionSteps.ts";
import type { ShellJob } from "../cli/types.ts";

export type ShellStatus = "connecting" | "ready" | "closing" | "closed" | "error";

/** Entries kept on screen */
const MAX_ENTRIES = 200;

export function useShell(job: ShellJob) {
  const [status, setStatus] = useState<ShellStatus>("connecting");
  const [message, setMessage] = useState<string>("Initializing...");
  const [entries, setEntries] = useState<ShellEntry[]>([]);
  const [exitCode, setExitCode] = useState<ExitCode>(ExitCode.SUCCESS);
  const { connectionSteps, failConnectionStep } = useConnectionSteps();
  const connection = useRef<ShellConnection | null>(null);

  const fail = useCallback(
    (error: unknown) => {
      const description = describeError(error);
      failConnectionStep(description);
      setExitCode(exitCodeFor(error));
      setMessage(description);
      setStatus("error");
    },
    [failConnectionStep],
  );

  /**
   * Disconnect and leave the shell, also while still scanning or connecting
   */
  const quit = useCallback(async () => {
    const current = connection.current;
    if (!current || current.isClosed) {
      return;
    }
    setStatus((prev) => (prev === "error" ? prev : "closing"));
    await current.close();
    setStatus((prev) => (prev === "error" ? prev : "closed"));
  }, []);

  /**
   * Hand one input line to the session; input keeps flowing while it runs
   */
  const submit = useCallback(
    (line: string) => {
      const session = connection.current?.current;
      if (!session || session.isClosed) {
        return;
      }

      session
        .submit(line)
        .then((outcome) => (outcome === "quit" ? quit() : undefined))
        .catch(async (error: unknown) => {
          fail(error);
          await connection.current?.close();
        })
        .catch((error: unknown) => {
          logger.error(`Shell shutdown failed: ${error}`);
        });
    },
    [fail, quit],
  );

  useEffect(() => {
    const shell = new ShellConnection(new BleTransport(job.bleConfig), {
      retryLimit: job.protocolConfig.retryLimit,
      retryDelayMs: job.protocolConfig.retryDelay * 1000,
    });
    connection.current = shell;
    let unsubscribe: (() => void) | null = null;

    const onSigint = () => {
      quit().catch((error: unknown) => logger.error(`Shutdown failed: ${error}`));
    };
    process.on("SIGINT", onSigint);

    const connect = async () => {
      try {
        setMessage("Connecting to smART Sketcher...");
        const opened = await shell.open();
        if (!opened) {
          return;
        }

        unsubscribe = opened.session.onEntry((entry) => {
          setEntries((prev) => [...prev, entry].slice(-MAX_ENTRIES));
        });
        setMessage(
          `Connected to ${opened.device.name || opened.device.address}. Type 'help' for commands.`,
        );
        setStatus("ready");
      } catch (error) {
        fail(error);
      }
    };

    connect().catch((error: unknown) => {
      logger.error(`Shell connection aborted: ${error}`);
    });

    return () => {
      process.off("SIGINT", onSigint);
      unsubscribe?.();
      shell.close().catch((error: unknown) => logger.error(`Shutdown failed: ${error}`));
    };
  }, [job, fail, quit]);

  return {
    status,
    message,
    entries,
    exitCode,
    connectionSteps,
    submit,
    quit,
  };
}

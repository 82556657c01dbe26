import { useState, useEffect, useCallback } from "react";
import { logger, LogEventType } from "../lib/utils/logger.ts";
import type { ConnectionStep } from "../components/index.ts";
import { failActiveStep, updateStepStatus } from "../utils/app-utils.ts";

const INITIAL_STEPS: ConnectionStep[] = [
  { id: "scan", label: "Scanning for device", status: "pending" },
  { id: "connect", label: "Connecting to device", status: "pending" },
  { id: "discover", label: "Discovering characteristics", status: "pending" },
];

/**
 * Follows the scan / connect / discover sequence through logger events
 */
export function useConnectionSteps() {
  const [connectionSteps, setConnectionSteps] =
    useState<ConnectionStep[]>(INITIAL_STEPS);

  useEffect(() => {
    const unsubscribe = logger.onLog((entry) => {
      switch (entry.eventType) {
        case LogEventType.SCAN_START:
          setConnectionSteps((prev) => updateStepStatus(prev, "scan", "active"));
          break;

        case LogEventType.DEVICE_FOUND:
          setConnectionSteps((prev) =>
            updateStepStatus(prev, "scan", "complete", "connect"),
          );
          break;

        case LogEventType.CONNECT_START:
          setConnectionSteps((prev) =>
            updateStepStatus(prev, "connect", "active"),
          );
          break;

        case LogEventType.CONNECTED:
          setConnectionSteps((prev) =>
            updateStepStatus(prev, "connect", "complete", "discover"),
          );
          break;

        case LogEventType.DISCOVER_CHAR:
          setConnectionSteps((prev) =>
            updateStepStatus(prev, "discover", "complete"),
          );
          break;
      }
    });

    return unsubscribe;
  }, []);

  const failConnectionStep = useCallback((error: string) => {
    setConnectionSteps((prev) => failActiveStep(prev, error));
  }, []);

  return { connectionSteps, failConnectionStep };
}

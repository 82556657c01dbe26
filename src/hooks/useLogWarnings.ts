import { useState, useEffect } from "react";
import { logger, LogLevel } from "../lib/utils/logger.ts";

/**
 * Most recent warnings and errors from the logger, oldest first
 */
export function useLogWarnings(limit: number = 3): string[] {
  const [warnings, setWarnings] = useState<string[]>([]);

  useEffect(() => {
    return logger.onLog((entry) => {
      if (entry.level >= LogLevel.WARNING) {
        setWarnings((prev) => [...prev, entry.message].slice(-limit));
      }
    });
  }, [limit]);

  return warnings;
}

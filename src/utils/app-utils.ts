import { statSync } from "node:fs";
import { extname } from "node:path";
import type { ConnectionStep } from "../components/index.ts";
import type {
  BLEConfig,
  FitPolicy,
  ImageConfig,
  ProtocolConfig,
} from "../lib/protocol/index.ts";
import {
  DEFAULT_BLE_CONFIG,
  DEFAULT_IMAGE_CONFIG,
  DEFAULT_PROTOCOL_CONFIG,
} from "../lib/protocol/index.ts";
import { ConfigurationError } from "../lib/utils/errors.ts";
import type { ConnectionOptions, UploadOptions } from "../cli/types.ts";

export const IMAGE_EXTENSIONS = [".png", ".jpg", ".jpeg"];

const FIT_POLICIES: readonly FitPolicy[] = ["cover", "contain"];

export function isSupportedImage(path: string): boolean {
  return IMAGE_EXTENSIONS.includes(extname(path).toLowerCase());
}

/**
 * Check that `path` names an existing PNG or JPEG file
 * @throws ConfigurationError otherwise
 */
export function validateImagePath(path: string): void {
  if (!isSupportedImage(path)) {
    throw new ConfigurationError(
      `Unsupported file format: ${extname(path) || "(none)"}. Supported formats: PNG, JPG, JPEG`,
    );
  }

  let isFile = false;
  try {
    isFile = statSync(path).isFile();
  } catch (error) {
    throw new ConfigurationError(`Cannot access ${path}: ${error}`);
  }
  if (!isFile) {
    throw new ConfigurationError(`Not a file: ${path}`);
  }
}

/**
 * Parse a numeric command-line option
 * @throws ConfigurationError when the value is not a number in range
 */
export function parseNumberOption(
  name: string,
  value: string,
  { integer = false, min = 0 }: { integer?: boolean; min?: number } = {},
): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed)) {
    throw new ConfigurationError(`--${name} must be a number, got '${value}'`);
  }
  if (integer && !Number.isInteger(parsed)) {
    throw new ConfigurationError(`--${name} must be an integer, got '${value}'`);
  }
  if (parsed < min) {
    throw new ConfigurationError(`--${name} must be at least ${min}, got '${value}'`);
  }
  return parsed;
}

export function buildBleConfig(options: ConnectionOptions): BLEConfig {
  return {
    ...DEFAULT_BLE_CONFIG,
    deviceName: options.name,
    deviceAddress: options.address,
    scanTimeout: parseNumberOption("scan-timeout", options.scanTimeout, {
      min: 0.1,
    }),
  };
}

export function buildProtocolConfig(
  options: ConnectionOptions & Partial<Pick<UploadOptions, "frameSize" | "packetDelay">>,
): ProtocolConfig {
  return {
    ...DEFAULT_PROTOCOL_CONFIG,
    retryLimit: parseNumberOption("retries", options.retries, { integer: true }),
    frameSize:
      options.frameSize === undefined
        ? DEFAULT_PROTOCOL_CONFIG.frameSize
        : parseNumberOption("frame-size", options.frameSize, {
            integer: true,
            min: 1,
          }),
    packetDelay:
      options.packetDelay === undefined
        ? DEFAULT_PROTOCOL_CONFIG.packetDelay
        : parseNumberOption("packet-delay", options.packetDelay) / 1000,
  };
}

export function buildImageConfig(options: Pick<UploadOptions, "fit">): ImageConfig {
  const fit = FIT_POLICIES.find((policy) => policy === options.fit);
  if (!fit) {
    throw new ConfigurationError(
      `--fit must be one of ${FIT_POLICIES.join(", ")}, got '${options.fit}'`,
    );
  }
  return { ...DEFAULT_IMAGE_CONFIG, fit };
}

export function updateStepStatus(
  steps: ConnectionStep[],
  stepId: string,
  status: "pending" | "active" | "complete" | "error",
  nextStepId?: string,
): ConnectionStep[] {
  return steps.map((step) => {
    if (step.id === stepId) return { ...step, status };
    if (nextStepId && step.id === nextStepId)
      return { ...step, status: "active" };
    return step;
  });
}

/**
 * Mark whichever step is active as failed
 */
export function failActiveStep(
  steps: ConnectionStep[],
  error: string,
): ConnectionStep[] {
  return steps.map((step) =>
    step.status === "active" ? { ...step, status: "error", error } : step,
  );
}

import { Command } from "commander";
import { LogLevel, logger } from "../lib/utils/logger.ts";
import {
  ConfigurationError,
  describeError,
  exitCodeFor,
} from "../lib/utils/errors.ts";
import { DEVICE_NAME_FILTER } from "../lib/protocol/index.ts";
import {
  buildBleConfig,
  buildImageConfig,
  buildProtocolConfig,
  validateImagePath,
} from "../utils/app-utils.ts";
import type {
  ShellJob,
  ShellOptions,
  UploadJob,
  UploadOptions,
} from "./types.ts";

/**
 * Print a failure and exit with its code
 */
function exitWithError(error: unknown): never {
  console.error(`Error: ${describeError(error)}`);
  process.exit(exitCodeFor(error));
}

function withConnectionOptions(command: Command): Command {
  return command
    .option("--address <address>", "BLE device address (skips name matching)")
    .option("--name <name>", "Advertised name to look for", DEVICE_NAME_FILTER)
    .option("--scan-timeout <seconds>", "How long to scan for the device", "5")
    .option("--retries <n>", "Re-sends of a frame whose write failed", "3");
}

export function setupCLI() {
  const program = new Command();

  program
    .name("smartsketchctl")
    .description(
      "CLI tool for sending images and commands to smART Sketcher 2.0 projectors",
    )
    .version("1.0.0")
    .option("-v, --verbose", "Show detailed logs including frame data", false);

  const applyVerbose = () => {
    const { verbose } = program.opts<{ verbose: boolean }>();
    if (verbose) {
      logger.setLevel(LogLevel.DEBUG);
    }
    // ink owns the screen; the apps show warnings themselves
    logger.setConsoleEnabled(verbose);
  };

  withConnectionOptions(
    program
      .command("upload [image]")
      .description("Upload a PNG or JPEG image to the projector"),
  )
    .option("--frame-size <bytes>", "Bytes per image data frame", "80")
    .option("--packet-delay <ms>", "Delay between data frames in milliseconds", "10")
    .option("--fit <policy>", "Resize policy: cover or contain", "cover")
    .option("--test", "Upload a checkerboard test pattern instead of a file", false)
    .action(async (imageArg: string | undefined, options: UploadOptions) => {
      applyVerbose();

      let job: UploadJob;
      try {
        if (!options.test && !imageArg) {
          throw new ConfigurationError(
            "Either provide an image path or use --test. Usage: smartsketchctl upload <image>  or  smartsketchctl upload --test",
          );
        }
        if (imageArg && !options.test) {
          validateImagePath(imageArg);
        }

        job = {
          image: options.test ? undefined : imageArg,
          test: options.test,
          bleConfig: buildBleConfig(options),
          protocolConfig: buildProtocolConfig(options),
          imageConfig: buildImageConfig(options),
        };
      } catch (error) {
        exitWithError(error);
      }

      const { UploadApp } = await import("../components/UploadApp.tsx");
      const { render } = await import("ink");
      render(<UploadApp job={job} />, { exitOnCtrlC: false });
    });

  withConnectionOptions(
    program
      .command("shell")
      .description("Open an interactive shell that sends raw commands to the projector"),
  ).action(async (options: ShellOptions) => {
    applyVerbose();

    let job: ShellJob;
    try {
      if (!process.stdin.isTTY) {
        throw new ConfigurationError("The shell needs an interactive terminal");
      }
      job = {
        bleConfig: buildBleConfig(options),
        protocolConfig: buildProtocolConfig(options),
      };
    } catch (error) {
      exitWithError(error);
    }

    const { ShellApp } = await import("../components/ShellApp.tsx");
    const { render } = await import("ink");
    render(<ShellApp job={job} />, { exitOnCtrlC: false });
  });

  return program;
}

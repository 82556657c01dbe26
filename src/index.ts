#!/usr/bin/env -S npx tsx
import { setupCLI } from "./cli/index.tsx";

await setupCLI().parseAsync(process.argv);

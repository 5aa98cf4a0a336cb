#!/usr/bin/env -S tsx
import { exec } from "./exec.js";

/**
 * Same as cli.ts, but run straight from the sources with tsx so a stale
 * dist/ never gets in the way.
 */

await exec();

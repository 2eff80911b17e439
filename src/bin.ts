#!/usr/bin/env node
/**
 * article-cards - CLI Entry Point
 *
 * Usage:
 *   article-cards --deck "Reading" --to-file
 *   node dist/bin.js --help
 *
 * @module bin
 */

import { runCli } from './index.js';

process.exitCode = await runCli();

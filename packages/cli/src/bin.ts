#!/usr/bin/env tsx
/**
 * licensekit command line entry point.
 *
 * Usage:
 *   licensekit keygen --out keys
 *   licensekit issue --spec license.json --key keys/private.pem
 *   licensekit verify license.xml --key keys/public.pem
 */

import { run } from './index';

const result = await run(process.argv.slice(2), { color: process.stdout.isTTY === true });
process.stdout.write(result.stdout);
process.stderr.write(result.stderr);
process.exitCode = result.exitCode;

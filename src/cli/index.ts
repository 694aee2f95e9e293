#!/usr/bin/env node
/**
 * CLI Entry Point
 * Loads .env from the working directory so RC_* settings apply.
 */

import { config as dotenvConfig } from 'dotenv';
import { createProgram } from './program';

dotenvConfig();

createProgram().parse();

#!/usr/bin/env node
// src/cli.ts

import { main } from './main.js';

process.exitCode = await main();

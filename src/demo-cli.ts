#!/usr/bin/env node

import { runDemo } from './demo';

process.exit(runDemo(process.argv.slice(1)));

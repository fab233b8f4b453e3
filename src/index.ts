#!/usr/bin/env node
// Load environment variables from .env file
import dotenv from 'dotenv';
dotenv.config();

import { runCli } from './cli';

process.exitCode = runCli(process.argv.slice(2));

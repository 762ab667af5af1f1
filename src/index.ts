#!/usr/bin/env node
import { runMain } from "./cli/issue-command.js";

process.exitCode = runMain();

#!/usr/bin/env node
import { run } from "./salescope.js";

process.exitCode = run(process.argv);

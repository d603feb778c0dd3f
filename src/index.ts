#!/usr/bin/env node
import { createCli } from "./cli/program.js";

void createCli().runExit(process.argv.slice(2));

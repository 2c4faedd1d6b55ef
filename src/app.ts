#!/usr/bin/env node
import { hideBin } from "yargs/helpers";
import { runCli } from "./cli";

void runCli(hideBin(process.argv));

#!/usr/bin/env node
import { config as loadDotenv } from "dotenv";
import { loadCliConfig } from "./config.js";
import { createProgram } from "./program.js";

loadDotenv();

createProgram(loadCliConfig()).parse(process.argv);

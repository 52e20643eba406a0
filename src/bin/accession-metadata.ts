#!/usr/bin/env node
import "dotenv/config";
import { main } from "../cli.js";

await main();

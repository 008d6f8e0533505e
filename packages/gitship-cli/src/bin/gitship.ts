#!/usr/bin/env node
import { main } from './run';

await main(process.argv);

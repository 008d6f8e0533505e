#!/usr/bin/env node
import { main } from './run';

const [node = 'node', script = 'gitship-analyze', ...rest] = process.argv;
await main([node, script, 'analyze', ...rest]);

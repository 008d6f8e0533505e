#!/usr/bin/env node
import { main } from './run';

const [node = 'node', script = 'gitship-deploy', ...rest] = process.argv;
await main([node, script, 'deploy', ...rest]);

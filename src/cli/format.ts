#!/usr/bin/env node
// src/cli/format.ts
import { createProgram } from './program';

createProgram().parse(process.argv);

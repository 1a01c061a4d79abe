#!/usr/bin/env node

import { createBuildArtifactsProgram } from '../commands/build-artifacts.js';

await createBuildArtifactsProgram().parseAsync(process.argv);

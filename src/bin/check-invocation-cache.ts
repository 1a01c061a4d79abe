#!/usr/bin/env node

import { createCheckInvocationProgram } from '../commands/check-invocation.js';

await createCheckInvocationProgram().parseAsync(process.argv);

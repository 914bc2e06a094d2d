#!/usr/bin/env node
// addlinks CLI

import { createAddLinksCommand } from './commands/addlinks.js';
import { handleError } from './utils/error-handler.js';

createAddLinksCommand().parseAsync(process.argv).catch(handleError);

/**
 * Bundle entry loaded by every documentation page.
 * Bundled as IIFE so it can be listed as a plain script by the site generator.
 */

import { start } from './bootstrap';

start();

/**
 * Jest setup file.
 *
 * Loads reflect-metadata before any decorated class, and swaps Jest's
 * console for Node's native one. Jest's console prints a stack trace under
 * every console.log/error/warn call:
 *
 *   console.log
 *     [HtmxFilter] GET /todos (htmx) HX-Trigger=foo
 *
 *       at HtmxFilter.logDirectives (HtmxFilter.ts:54:21)
 *
 * Node's console prints just the message.
 */
import 'reflect-metadata';
import nodeConsole = require('console');

global.console = nodeConsole;

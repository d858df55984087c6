/**
 * Runtime Module
 */

export { ScriptRunner, describeException } from './script-runner.js';

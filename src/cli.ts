import { Command } from 'commander';
import { APP_NAME, DESCRIPTION, DISPLAY_NAME } from './config/branding.js';
import {
  registerBuild,
  registerDoctor,
  registerHints,
  registerList,
  registerVersion,
} from './commands/index.js';

const program = new Command()
  .name(APP_NAME)
  .description(
    `${DISPLAY_NAME}: ${DESCRIPTION}.\n` +
      'Builds, installs and verifies the native libraries listed in third_party/deps.yaml\n' +
      'and writes CMake hints for the downstream build.',
  )
  .enablePositionalOptions()
  .showHelpAfterError(true);

registerVersion(program);
registerBuild(program);
registerHints(program);
registerList(program);
registerDoctor(program);

await program.parseAsync();

import { program } from 'commander';
import { ConfigEngine, graphToJSON, setLogLevel } from '@cfgscript/core';
import { loadCliConfig, type CliOptions } from './config.js';
import { renderError } from './report.js';

program
  .name('cfgscript')
  .description('Build a configuration graph from a list of initializers')
  .option('-c, --config <path>', 'config file path')
  .option('-j, --json <jsonString>', 'config as a JSON string')
  .parse(process.argv);

const options = program.opts<CliOptions>();

try {
  const config = loadCliConfig(options);
  if (config.logLevel) setLogLevel(config.logLevel);

  const engine = new ConfigEngine({ baseDir: config.baseDir, moduleRoots: config.moduleRoots });
  const graph = await engine.build(config.initializers);
  console.log(JSON.stringify(graphToJSON(graph), null, 2));
} catch (error) {
  console.error(renderError(error));
  process.exit(1);
}

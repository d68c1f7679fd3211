import {createLogContext} from '../../shared/src/logging.ts';
import {
  parseOptionsWithArgs,
  usage,
  wantsHelp,
} from '../../shared/src/options.ts';
import {countDistinct, readLines} from './cli.ts';
import {ENV_VAR_PREFIX, hllOptionDocs, hllOptions} from './config.ts';
import {loadKeyHasher} from './hash.ts';

async function main() {
  const argv = process.argv.slice(2);
  if (wantsHelp(argv)) {
    process.stdout.write(
      usage(hllOptions, ENV_VAR_PREFIX, hllOptionDocs, [
        {
          header: 'hll [options] [file ...]',
          content:
            'Estimates the number of distinct lines in the given files. ' +
            'With no file, or when a file is -, reads stdin.',
        },
      ]) + '\n',
    );
    return;
  }

  const {config, args} = parseOptionsWithArgs(
    hllOptions,
    argv,
    ENV_VAR_PREFIX,
    process.env,
    hllOptionDocs,
  );
  const lc = createLogContext(
    {log: {level: config.logLevel, format: config.logFormat}},
    {worker: 'hll'},
  );
  const hash = await loadKeyHasher(BigInt(config.seed));
  await countDistinct(lc, config, readLines(args), hash, process.stdout);
}

main().catch(err => {
  console.error(err);
  process.exit(1);
});

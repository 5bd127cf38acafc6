#!/usr/bin/env tsx

// Load .env FIRST, before any other module initializes
import './env.js';

import { parseDecodeArgs, USAGE } from './cli/args.js';
import { readBatchFile } from './cli/batch-file.js';
import { dim, divider, error, formatResult } from './cli/ui.js';
import { loadCodecConfig, logLevelOf } from './config/load.js';
import { setLogLevel } from './logger.js';
import { CharacteristicRegistry } from './registry/registry.js';
import { YamlSpecSource } from './registry/spec-source.js';
import { GattTranslator } from './translator.js';
import { errMsg, fromHex } from './utils/error.js';

async function main(): Promise<number> {
  const args = parseDecodeArgs(process.argv.slice(2));
  const { command } = args;
  if (command.kind === 'help') {
    console.log(USAGE);
    return 0;
  }

  const config = loadCodecConfig();
  setLogLevel(logLevelOf(config));

  const registry = new CharacteristicRegistry({
    source: new YamlSpecSource(config.spec_path, config.units_path),
  });
  await registry.preload();
  const translator = new GattTranslator({ registry, trace: args.trace ?? config.trace });

  switch (command.kind) {
    case 'list': {
      for (const info of translator.listSupported()) {
        const unit = info.unit ? dim(` (${info.unit})`) : '';
        console.log(`  ${info.uuid.shortForm}  ${info.name}${unit}`);
      }
      return 0;
    }

    case 'single': {
      const data = fromHex(command.hex);
      if (!data) {
        console.error(error(`Not a hex payload: '${command.hex}'`));
        return 2;
      }
      const result = translator.parse(command.id, data);
      console.log(formatResult(command.id, result));
      return result.success ? 0 : 1;
    }

    case 'batch': {
      const input = readBatchFile(command.file);
      const results = translator.parseBatch(input);
      const entries = Object.entries(results);
      entries.forEach(([id, result], index) => {
        if (index > 0) console.log(divider());
        console.log(formatResult(id, result));
      });
      const failed = entries.filter(([, r]) => !r.success).length;
      console.log(dim(`\n${entries.length - failed}/${entries.length} decoded`));
      return failed === 0 ? 0 : 1;
    }
  }
}

main()
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    console.error(error(errMsg(err)));
    process.exit(2);
  });

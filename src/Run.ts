import { readFileSync } from 'node:fs';
import { Command, Option } from '@commander-js/extra-typings';
import { quadToStringQuad } from 'rdf-string';
import type { DecoderOptions } from './DecodeUtil';
import { ConfigurationFault, DecodeFault } from './FaultUtil';
import type { Format } from './FormatUtil';
import { createDecoder, formatFromPath, FORMATS } from './FormatUtil';
import type { LogLevel } from './LogUtil';
import { getLogger, LOG_LEVELS, setLogLevel } from './LogUtil';
import type { Triple } from './TermUtil';
import { toRdfQuad } from './TermUtil';

const logger = getLogger('Run');

export type RunOptions = DecoderOptions & {
  input: string;
  format: Format;
  logLevel?: LogLevel;
};

export function runCli(args: string[]): void {
  const program = new Command()
    .name('rdf-decode')
    .showHelpAfterError()
    .argument('[string]', 'RDF string to decode, if no file was provided')
    .option('-f, --file <string>', 'file to read from')
    .addOption(new Option(
      '-t, --format <format>',
      'serialization format, guessed from the file extension if not provided',
    ).choices(FORMATS))
    .option('-b, --base <iri>', 'base IRI to resolve relative IRIs against')
    .option('--blankNodePrefix <string>', 'prefix added to all blank node labels')
    .addOption(new Option(
      '-l, --logLevel <level>',
      'logger level',
    ).choices(LOG_LEVELS).default('info' as const));

  program.parse(args);

  const opts = program.opts();
  if (program.args.length > 1) {
    program.error('Only 1 argument is accepted');
  }
  if (program.args.length > 0 && opts.file) {
    program.error('File option can not be combined with string input');
  }
  if (program.args.length === 0 && !opts.file) {
    program.error('Either a file or string input is required');
  }

  const input = opts.file ? readFileSync(opts.file).toString() : program.args[0];
  const format = opts.format ?? (opts.file ? formatFromPath(opts.file) : undefined) ?? 'nquads';

  try {
    for (const statement of run({
      input,
      format,
      baseIri: opts.base,
      blankNodePrefix: opts.blankNodePrefix,
      logLevel: opts.logLevel,
    })) {
      console.log(JSON.stringify(quadToStringQuad(toRdfQuad(statement))));
    }
  } catch (error: unknown) {
    if (error instanceof DecodeFault || error instanceof ConfigurationFault) {
      program.error(error.message);
    }
    throw error;
  }
}

/**
 * Decodes the input, yielding statements until the input ends.
 * Throws the first fault in the input.
 */
export function* run(opts: RunOptions): IterableIterator<Triple> {
  setLogLevel(opts.logLevel ?? 'error');

  const decoder = createDecoder(opts.input, opts.format, opts);
  logger.verbose(`Decoding ${opts.input.length} characters of ${opts.format}`);
  yield* decoder;
}

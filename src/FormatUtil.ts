import { extname } from 'node:path';
import type { Decoder, DecoderOptions } from './DecodeUtil';
import { ConfigurationFault } from './FaultUtil';
import { NQuadsDecoder } from './grammars/nquads';
import { NTriplesDecoder } from './grammars/ntriples';
import { TurtleDecoder } from './grammars/turtle';
import { getLogger } from './LogUtil';
import type { Quad, Triple } from './TermUtil';

const logger = getLogger('Format');

export const FORMATS = [ 'ntriples', 'nquads', 'turtle', 'rdfxml' ] as const;

/**
 * Serialization formats a decoder can be requested for.
 */
export type Format = typeof FORMATS[number];

const EXTENSIONS: Record<string, Format | undefined> = {
  '.nt': 'ntriples',
  '.nq': 'nquads',
  '.ttl': 'turtle',
  '.rdf': 'rdfxml',
  '.owl': 'rdfxml',
};

/**
 * Guesses the format of a file based on its extension.
 */
export function formatFromPath(path: string): Format | undefined {
  return EXTENSIONS[extname(path).toLowerCase()];
}

/**
 * Creates a decoder for the given format.
 * Throws a {@link ConfigurationFault} immediately if there is no decoder for that format.
 */
export function createDecoder(input: string, format: 'nquads', options?: DecoderOptions): Decoder<Quad>;
export function createDecoder(input: string, format: Format, options?: DecoderOptions): Decoder<Triple>;
export function createDecoder(input: string, format: Format, options: DecoderOptions = {}): Decoder<Triple> {
  logger.debug(`Creating ${format} decoder`);
  switch (format) {
    case 'ntriples':
      return new NTriplesDecoder(input, options);
    case 'nquads':
      return new NQuadsDecoder(input, options);
    case 'turtle':
      return new TurtleDecoder(input, options);
    default:
      throw new ConfigurationFault(format);
  }
}

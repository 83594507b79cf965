import type { DecoderOptions } from '../DecodeUtil';
import type { GraphLabel, Quad } from '../TermUtil';
import { defaultGraph } from '../TermUtil';
import { LineDecoder } from './line';

/**
 * Decodes N-Quads, one quad per line:
 * subject, predicate, object, an optional graph label and a dot.
 */
export class NQuadsDecoder extends LineDecoder<Quad> {
  /**
   * Graph of the quads without a graph label, the same term for the whole lifetime of the decoder.
   */
  public readonly defaultGraph: GraphLabel;

  public constructor(input: string, options: DecoderOptions = {}) {
    super('nquads', input, options);
    this.defaultGraph = options.defaultGraph ?? defaultGraph();
  }

  protected parseStatement(): Quad | undefined {
    if (!this.skipEmptyLines()) {
      return;
    }

    const subject = this.parseSubject();
    const predicate = this.parsePredicate();
    const object = this.parseObject();
    // A line ending after the object is a missing dot, not a missing graph label
    const next = this.tokens.peek().kind;
    let graph: GraphLabel = this.defaultGraph;
    if (next !== 'Dot' && next !== 'EndOfLine' && next !== 'EndOfInput') {
      graph = this.parseGraphLabel();
    }
    this.expectStatementEnd();

    return { subject, predicate, object, graph };
  }
}

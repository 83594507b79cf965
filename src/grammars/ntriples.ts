import type { DecoderOptions } from '../DecodeUtil';
import type { Triple } from '../TermUtil';
import { LineDecoder } from './line';

export class NTriplesDecoder extends LineDecoder<Triple> {
  public constructor(input: string, options: DecoderOptions = {}) {
    super('ntriples', input, options);
  }

  protected parseStatement(): Triple | undefined {
    if (!this.skipEmptyLines()) {
      return;
    }

    const subject = this.parseSubject();
    const predicate = this.parsePredicate();
    const object = this.parseObject();
    this.expectStatementEnd();

    return { subject, predicate, object };
  }
}

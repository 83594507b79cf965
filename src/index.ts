export * from './BufferUtil';
export * from './DecodeUtil';
export * from './FaultUtil';
export * from './FormatUtil';
export * from './grammars/line';
export * from './grammars/nquads';
export * from './grammars/ntriples';
export * from './grammars/turtle';
export * from './LexUtil';
export * from './LogUtil';
export * from './Run';
export * from './TermUtil';
export * from './TokenUtil';

// Grammar packages whose node bindings ship without typings.
// Parser.setLanguage accepts the raw binding, so nothing more is needed.
declare module 'tree-sitter-go' {
  const go: unknown;
  export default go;
}

declare module 'tree-sitter-typescript' {
  const grammars: { typescript: unknown; tsx: unknown };
  export default grammars;
}

export interface SubstitutionRule {
  pattern: RegExp;
  replacement: string;
}

// Replacement templates use String.prototype.replace syntax: `$1` is the
// captured argument and `$$` a literal dollar (inline math delimiter).
// Order matters: the nested covariance forms must run before the plain
// `\mat`/`\emat` rules rewrite their inner macro.
export const MACRO_SUBSTITUTION_RULES: readonly SubstitutionRule[] = [
  { pattern: /\\begin\{figure\*\}/g, replacement: "\\begin{figure}" },
  { pattern: /\\end\{figure\*\}/g, replacement: "\\end{figure}" },
  {
    pattern: /\\tcov\{\\mat\{([^}]+)\}\}/g,
    replacement: "$$\\mathbf{\\Sigma}_\\mathbf{$1}$$",
  },
  {
    pattern: /\\tcov\{\\emat\{([^}]+)\}\}/g,
    replacement: "$$\\mathbf{\\Sigma}_{\\widehat{\\mathbf{$1}}}$$",
  },
  {
    pattern: /\\tcov\{\\text\{([^}]+)\}\}/g,
    replacement: "$$\\mathbf{\\Sigma}_\\text{$1}$$",
  },
  {
    pattern: /\\icov\{\\emat\{([^}]+)\}\}/g,
    replacement: "\\mathbf{\\Sigma}^{-1}_{\\widehat{\\mathbf{$1}}}",
  },
  {
    pattern: /\\ticov\{\\emat\{([^}]+)\}\}/g,
    replacement: "$$\\mathbf{\\Sigma}^{-1}_{\\widehat{\\mathbf{$1}}}$$",
  },
  { pattern: /\\mat\{([^}]+)\}/g, replacement: "\\mathbf{$1}" },
  { pattern: /\\vec\{([^}]+)\}/g, replacement: "\\mathbf{$1}" },
  { pattern: /\\tmat\{([^}]+)\}/g, replacement: "$$\\mathbf{$1}$$" },
  { pattern: /\\tvec\{([^}]+)\}/g, replacement: "$$\\mathbf{$1}$$" },
  { pattern: /\\emat\{([^}]+)\}/g, replacement: "\\widehat{\\mathbf{$1}}" },
  { pattern: /\\evec\{([^}]+)\}/g, replacement: "\\widehat{\\mathbf{$1}}" },
  { pattern: /\\temat\{([^}]+)\}/g, replacement: "$$\\widehat{\\mathbf{$1}}$$" },
  { pattern: /\\tevec\{([^}]+)\}/g, replacement: "$$\\widehat{\\mathbf{$1}}$$" },
  { pattern: /\\trans/g, replacement: "^\\mathsf{T}" },
  { pattern: /\\hermconj/g, replacement: "^\\mathsf{H}" },
  { pattern: /\\cov\{([^}]+)\}/g, replacement: "\\mathbf{\\Sigma}_\\mathbf{$1}" },
  { pattern: /\\icov\{([^}]+)\}/g, replacement: "\\mathbf{\\Sigma}^{-1}_\\mathbf{$1}" },
  { pattern: /\\tcov\{([^}]+)\}/g, replacement: "$$\\mathbf{\\Sigma}_\\mathbf{$1}$$" },
  {
    pattern: /\\ticov\{([^}]+)\}/g,
    replacement: "$$\\mathbf{\\Sigma}^{-1}_\\mathbf{$1}$$",
  },
  { pattern: /\\vspace\{2ex\}/g, replacement: "" },
  { pattern: /\\centering/g, replacement: "" },
];

export function applySubstitutionRules(
  line: string,
  rules: readonly SubstitutionRule[] = MACRO_SUBSTITUTION_RULES,
): string {
  return rules.reduce((current, rule) => current.replace(rule.pattern, rule.replacement), line);
}

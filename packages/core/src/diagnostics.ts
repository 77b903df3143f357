/**
 * Diagnostics reported at the tool boundary.
 */
export interface Diagnostic {
  code: string;
  message: string;
  hint?: string;
}

export function makeDiag(code: string, message: string, hint?: string): Diagnostic {
  return hint === undefined ? { code, message } : { code, message, hint };
}

export function formatDiagnostic(d: Diagnostic, pretty: boolean): string {
  if (!pretty) {
    return JSON.stringify(d);
  }
  let out = `error[${d.code}]: ${d.message}`;
  if (d.hint) {
    out += `\n  hint: ${d.hint}`;
  }
  return out;
}

export function formatDiagnostics(diags: Diagnostic[], pretty: boolean): string {
  if (!pretty) {
    return JSON.stringify(diags);
  }
  return diags.map((d) => formatDiagnostic(d, true)).join("\n\n");
}

/**
 * Comprobación estructural de un archivo de configuración de Nginx:
 * llaves balanceadas, directivas terminadas en `;` y cadenas cerradas.
 * No valida nombres de directivas ni argumentos.
 *
 * @returns Lista de problemas encontrados (vacía si el texto está bien formado)
 */
export function checkNginxSyntax(text: string): string[] {
  const problems: string[] = [];
  let depth = 0;
  let line = 1;
  // Hay tokens desde el último `;`, `{` o `}`
  let pending = false;
  let i = 0;

  while (i < text.length) {
    const ch = text.charAt(i);

    if (ch === '\n') {
      line++;
      i++;
      continue;
    }

    if (ch === ' ' || ch === '\t' || ch === '\r') {
      i++;
      continue;
    }

    if (ch === '#') {
      while (i < text.length && text.charAt(i) !== '\n') i++;
      continue;
    }

    if (ch === '"' || ch === "'") {
      const startLine = line;
      i++;
      while (i < text.length && text.charAt(i) !== ch) {
        if (text.charAt(i) === '\\') i++;
        else if (text.charAt(i) === '\n') line++;
        i++;
      }
      if (i >= text.length) {
        problems.push(`línea ${startLine}: cadena sin cerrar`);
        return problems;
      }
      pending = true;
      i++;
      continue;
    }

    if (ch === '$' && text.charAt(i + 1) === '{') {
      while (i < text.length && text.charAt(i) !== '}') i++;
      pending = true;
      i++;
      continue;
    }

    if (ch === ';') {
      if (!pending) problems.push(`línea ${line}: ";" inesperado`);
      pending = false;
    } else if (ch === '{') {
      if (!pending) problems.push(`línea ${line}: bloque sin directiva`);
      depth++;
      pending = false;
    } else if (ch === '}') {
      if (pending) problems.push(`línea ${line}: directiva sin terminar antes de "}"`);
      if (depth === 0) {
        problems.push(`línea ${line}: "}" sin bloque abierto`);
      } else {
        depth--;
      }
      pending = false;
    } else {
      pending = true;
    }
    i++;
  }

  if (pending) problems.push('fin del archivo: directiva sin terminar');
  if (depth > 0) problems.push(`fin del archivo: ${depth} bloque(s) sin cerrar`);

  return problems;
}

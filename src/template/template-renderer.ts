import { MissingConfigurationValueError } from './missing-configuration-value.error';

// `%%` es un `%` literal; `%(clave.con.puntos)s` es un marcador
const PLACEHOLDER_PATTERN = /%%|%\(([^()]+)\)s/g;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Devuelve las claves de los marcadores en el orden en que aparecen, sin repetir.
 */
export function listPlaceholders(template: string): string[] {
  const keys: string[] = [];
  for (const match of template.matchAll(PLACEHOLDER_PATTERN)) {
    const key = match[1];
    if (key !== undefined && !keys.includes(key)) {
      keys.push(key);
    }
  }
  return keys;
}

/**
 * Resuelve una clave con puntos recorriendo el objeto de valores segmento a segmento.
 * Solo una cadena no vacía cuenta como valor.
 */
export function resolveBinding(bindings: object, key: string): string | undefined {
  let current: unknown = bindings;
  for (const segment of key.split('.')) {
    if (!isRecord(current) || !Object.prototype.hasOwnProperty.call(current, segment)) {
      return undefined;
    }
    current = current[segment];
  }
  return typeof current === 'string' && current.length > 0 ? current : undefined;
}

/**
 * Sustituye todos los marcadores de la plantilla.
 * Todas las claves se validan antes de generar texto: o se devuelve el documento
 * completo o se lanza MissingConfigurationValueError con las claves que faltan.
 */
export function renderTemplate(template: string, bindings: object): string {
  const values = new Map<string, string>();
  const missing: string[] = [];

  for (const key of listPlaceholders(template)) {
    const value = resolveBinding(bindings, key);
    if (value === undefined) {
      missing.push(key);
    } else {
      values.set(key, value);
    }
  }

  if (missing.length > 0) {
    throw new MissingConfigurationValueError(missing);
  }

  return template.replace(PLACEHOLDER_PATTERN, (match: string, key: string | undefined) => {
    if (key === undefined) return '%';
    return values.get(key) ?? match;
  });
}

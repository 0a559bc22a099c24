/**
 * Se lanza cuando un marcador de la plantilla no tiene un valor utilizable
 * (clave ausente, forma incorrecta o cadena vacía).
 */
export class MissingConfigurationValueError extends Error {
  constructor(public readonly keys: string[]) {
    super(`Falta el valor de configuración: ${keys.join(', ')}`);
    this.name = 'MissingConfigurationValueError';
  }
}

import { listPlaceholders, renderTemplate, resolveBinding } from './template-renderer';
import { MissingConfigurationValueError } from './missing-configuration-value.error';

const captureError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('se esperaba una excepción');
};

describe('renderTemplate', () => {
  it('sustituye claves anidadas en su sitio', () => {
    const output = renderTemplate('a=%(x.y)s b=%(z)s', { x: { y: '1' }, z: '2' });

    expect(output).toBe('a=1 b=2');
  });

  it('sustituye todas las apariciones de un marcador repetido', () => {
    expect(renderTemplate('%(k)s-%(k)s', { k: 'v' })).toBe('v-v');
  });

  it('trata %% como un % literal', () => {
    expect(renderTemplate('100%% %(k)s', { k: 'v' })).toBe('100% v');
    expect(renderTemplate('%%(k)s', {})).toBe('%(k)s');
  });

  it('deja intacto un % que no forma parte de un marcador', () => {
    expect(renderTemplate('50% off %(k)s', { k: 'v' })).toBe('50% off v');
  });

  it('devuelve la plantilla sin cambios cuando no tiene marcadores', () => {
    expect(renderTemplate('listen 80;\n', {})).toBe('listen 80;\n');
  });

  it('produce la misma salida en renderizados repetidos', () => {
    const bindings = { a: { b: 'x' } };
    const template = 'uno %(a.b)s dos %(a.b)s';

    expect(renderTemplate(template, bindings)).toBe(renderTemplate(template, bindings));
  });

  it('lanza MissingConfigurationValueError con todas las claves ausentes', () => {
    const error = captureError(() => renderTemplate('%(a.b)s %(c)s %(d)s', { a: {}, d: 'x' }));

    expect(error).toBeInstanceOf(MissingConfigurationValueError);
    if (error instanceof MissingConfigurationValueError) {
      expect(error.keys).toEqual(['a.b', 'c']);
      expect(error.message).toBe('Falta el valor de configuración: a.b, c');
    }
  });

  it.each([
    ['un segmento intermedio que no es objeto', { a: 'texto' }],
    ['un valor numérico', { a: { b: 42 } }],
    ['un valor objeto', { a: { b: { c: 'x' } } }],
    ['una cadena vacía', { a: { b: '' } }],
    ['un valor null', { a: { b: null } }],
    ['un arreglo intermedio', { a: ['x'] }],
  ])('rechaza %s', (_label, bindings) => {
    expect(() => renderTemplate('%(a.b)s', bindings)).toThrow(MissingConfigurationValueError);
  });
});

describe('resolveBinding', () => {
  it('no resuelve propiedades heredadas', () => {
    expect(resolveBinding({}, 'toString')).toBeUndefined();
  });

  it('resuelve una cadena anidada', () => {
    expect(resolveBinding({ a: { b: { c: 'x' } } }, 'a.b.c')).toBe('x');
  });
});

describe('listPlaceholders', () => {
  it('devuelve las claves distintas en orden de aparición', () => {
    expect(listPlaceholders('%(b)s %(a.c)s %(b)s %%(d)s')).toEqual(['b', 'a.c']);
  });
});

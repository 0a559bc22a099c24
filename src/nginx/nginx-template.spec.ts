import { NGINX_SITE_TEMPLATE } from './nginx-template';
import { checkNginxSyntax } from './nginx-syntax';
import { buildSiteBindings } from './site-bindings';
import { listPlaceholders, renderTemplate } from '../template/template-renderer';
import { MissingConfigurationValueError } from '../template/missing-configuration-value.error';

const exampleInput = { hostname: 'example.com', runDir: '/var/run/app', installDir: '/opt/app' };

describe('NGINX_SITE_TEMPLATE', () => {
  it('declara los tres marcadores de instalación', () => {
    expect(listPlaceholders(NGINX_SITE_TEMPLATE)).toEqual([
      'installation.system.hostname',
      'installation.paths.run_dir',
      'installation.paths.install_dir',
    ]);
  });

  it('genera el virtual host con hostname, socket uwsgi y alias de estáticos', () => {
    const config = renderTemplate(NGINX_SITE_TEMPLATE, buildSiteBindings(exampleInput));

    expect(config).toContain('    server_name example.com;\n');
    expect(config).toContain('        uwsgi_pass unix:///var/run/app/main/sockets/uwsgi.unix;\n');
    expect(config).toContain('        alias /opt/app/resources/;\n');
  });

  it('escucha en el puerto 80 por IPv4 e IPv6 y cachea los estáticos 30 días', () => {
    const config = renderTemplate(NGINX_SITE_TEMPLATE, buildSiteBindings(exampleInput));

    expect(config).toContain('    listen 80;\n    listen [::]:80;\n');
    expect(config).toContain('    location /static-resource/ {\n');
    expect(config).toContain('        expires 30d;\n');
    expect(config).toContain(
      '        types {\n' +
        '            text/css css;\n' +
        '            application/javascript js;\n' +
        '            image/png png;\n' +
        '        }\n',
    );
  });

  it('solo cambia los marcadores respecto a la plantilla', () => {
    const config = renderTemplate(NGINX_SITE_TEMPLATE, buildSiteBindings(exampleInput));
    const expected = NGINX_SITE_TEMPLATE.replace('%(installation.system.hostname)s', 'example.com')
      .replace('%(installation.paths.run_dir)s', '/var/run/app')
      .replace('%(installation.paths.install_dir)s', '/opt/app');

    expect(config).toBe(expected);
  });

  it.each([
    exampleInput,
    { hostname: 'review.internal', runDir: '/run/review', installDir: '/usr/share/review' },
    { hostname: 'a-1.b-2.example.org', runDir: '/tmp/x', installDir: '/srv/app-2' },
  ])('genera un bloque server bien formado para $hostname', (input) => {
    const config = renderTemplate(NGINX_SITE_TEMPLATE, buildSiteBindings(input));

    expect(checkNginxSyntax(config)).toEqual([]);
  });

  it.each([
    ['installation.system.hostname', { system: {}, paths: { run_dir: '/run', install_dir: '/opt' } }],
    ['installation.paths.run_dir', { system: { hostname: 'h' }, paths: { install_dir: '/opt' } }],
    ['installation.paths.install_dir', { system: { hostname: 'h' }, paths: { run_dir: '/run' } }],
  ])('falla sin producir salida si falta %s', (key, installation) => {
    let output: string | undefined;
    let failure: unknown;
    try {
      output = renderTemplate(NGINX_SITE_TEMPLATE, { installation });
    } catch (error) {
      failure = error;
    }

    expect(output).toBeUndefined();
    expect(failure).toBeInstanceOf(MissingConfigurationValueError);
    if (failure instanceof MissingConfigurationValueError) {
      expect(failure.keys).toEqual([key]);
    }
  });
});

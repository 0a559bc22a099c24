import { Injectable, Logger, BadRequestException, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as fs from 'fs';
import { join } from 'path';
import { exec } from 'child_process';
import { promisify } from 'util';
import { NGINX_SITE_TEMPLATE } from './nginx-template';
import { checkNginxSyntax } from './nginx-syntax';
import { SiteInput, buildSiteBindings } from './site-bindings';
import { HOSTNAME_PATTERN, HOSTNAME_MAX_LENGTH, DIRECTORY_PATTERN } from './dto/render-site.dto';
import { renderTemplate, listPlaceholders } from '../template/template-renderer';
import { MissingConfigurationValueError } from '../template/missing-configuration-value.error';

const execPromise = promisify(exec);

const DEFAULT_NGINX_PATH = '/etc/nginx/conf.d';
const DEFAULT_RELOAD_COMMAND = 'nginx -s reload';
const DEFAULT_RELOAD_TIMEOUT_MS = 30000;

// Nombre de cada campo en los mensajes de error, según su origen
type SiteInputLabels = Record<keyof SiteInput, string>;

const REQUEST_LABELS: SiteInputLabels = {
  hostname: 'hostname',
  runDir: 'runDir',
  installDir: 'installDir',
};

const CONFIG_LABELS: SiteInputLabels = {
  hostname: 'INSTALL_HOSTNAME',
  runDir: 'INSTALL_RUN_DIR',
  installDir: 'INSTALL_DIR',
};

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export interface InstallSiteResult {
  success: boolean;
  message: string;
  filePath: string;
  hostname: string;
  reloaded: boolean;
}

export interface RemoveSiteResult {
  success: boolean;
  message: string;
  hostname: string;
  reloaded: boolean;
}

export interface InstalledSite {
  hostname: string;
  serverName: string | null;
  filePath: string;
}

@Injectable()
export class NginxService {
  private readonly logger = new Logger(NginxService.name);
  private readonly nginxPath: string;
  private readonly reloadCommand: string;
  private readonly reloadTimeoutMs: number;

  constructor(private configService: ConfigService) {
    this.nginxPath = this.configService.get<string>('NGINX_CONF_PATH') || DEFAULT_NGINX_PATH;
    // Un comando vacío desactiva la recarga
    this.reloadCommand = (
      this.configService.get<string>('NGINX_RELOAD_COMMAND') ?? DEFAULT_RELOAD_COMMAND
    ).trim();
    this.reloadTimeoutMs =
      Number(this.configService.get<string>('NGINX_RELOAD_TIMEOUT_MS')) || DEFAULT_RELOAD_TIMEOUT_MS;
  }

  describeTemplate() {
    return {
      template: NGINX_SITE_TEMPLATE,
      placeholders: listPlaceholders(NGINX_SITE_TEMPLATE),
    };
  }

  /**
   * Genera la configuración del virtual host sin efectos secundarios
   */
  renderSite(input: SiteInput): string {
    this.assertSiteInput(input, REQUEST_LABELS);
    return this.renderBindings(buildSiteBindings(input));
  }

  /**
   * Genera la configuración con los valores de INSTALL_HOSTNAME, INSTALL_RUN_DIR e INSTALL_DIR
   */
  renderSiteFromConfig(): string {
    const input = this.siteInputFromConfig();
    this.assertSiteInput(input, CONFIG_LABELS);
    return this.renderBindings(buildSiteBindings(input));
  }

  /**
   * Genera la configuración, la escribe en NGINX_CONF_PATH y recarga Nginx.
   * El archivo se escribe en un temporal y se renombra: nunca queda a medias.
   */
  async installSite(input: SiteInput): Promise<InstallSiteResult> {
    this.logger.log(`Instalando configuración de Nginx para ${input.hostname}`);
    return this.writeSite(input.hostname, this.renderSite(input));
  }

  /**
   * Igual que installSite, con los valores INSTALL_* de la configuración
   */
  async installSiteFromConfig(): Promise<InstallSiteResult> {
    const config = this.renderSiteFromConfig();
    const { hostname } = this.siteInputFromConfig();
    this.logger.log(`Instalando configuración de Nginx para ${hostname} (desde la configuración)`);
    return this.writeSite(hostname, config);
  }

  private async writeSite(hostname: string, config: string): Promise<InstallSiteResult> {
    const filePath = this.sitePath(hostname);
    const tempPath = `${filePath}.tmp`;

    try {
      if (!fs.existsSync(this.nginxPath)) {
        this.logger.warn(`El directorio ${this.nginxPath} no existe. Intentando crearlo...`);
        fs.mkdirSync(this.nginxPath, { recursive: true });
      }

      fs.writeFileSync(tempPath, config, 'utf8');
      fs.renameSync(tempPath, filePath);
      this.logger.log(`Archivo de configuración creado: ${filePath}`);
    } catch (error) {
      this.logger.error(`Error escribiendo la configuración de Nginx: ${describeError(error)}`);
      fs.rmSync(tempPath, { force: true });
      throw error;
    }

    const reloaded = await this.reloadNginx();

    return {
      success: true,
      message: `Configuración creada para ${hostname}`,
      filePath,
      hostname,
      reloaded,
    };
  }

  async removeSite(hostname: string): Promise<RemoveSiteResult> {
    this.logger.log(`Eliminando configuración de Nginx para ${hostname}`);

    this.assertHostname(hostname);
    const filePath = this.sitePath(hostname);

    if (!fs.existsSync(filePath)) {
      throw new NotFoundException(`La configuración para ${hostname} no existe`);
    }

    try {
      fs.unlinkSync(filePath);
      this.logger.log(`Archivo de configuración eliminado: ${filePath}`);
    } catch (error) {
      this.logger.error(`Error eliminando la configuración de Nginx: ${describeError(error)}`);
      throw error;
    }

    const reloaded = await this.reloadNginx();

    return {
      success: true,
      message: `Configuración eliminada para ${hostname}`,
      hostname,
      reloaded,
    };
  }

  /**
   * Lista los sitios instalados en NGINX_CONF_PATH
   */
  listSites(): InstalledSite[] {
    if (!fs.existsSync(this.nginxPath)) {
      return [];
    }

    try {
      return fs
        .readdirSync(this.nginxPath)
        .filter((file) => file.endsWith('.conf'))
        .sort()
        .map((file) => {
          const filePath = join(this.nginxPath, file);
          const content = fs.readFileSync(filePath, 'utf8');
          const serverNameMatch = content.match(/server_name\s+([^;]+);/);

          return {
            hostname: file.slice(0, -'.conf'.length),
            serverName: serverNameMatch ? serverNameMatch[1].trim() : null,
            filePath,
          };
        });
    } catch (error) {
      this.logger.error(`Error listando configuraciones: ${describeError(error)}`);
      throw error;
    }
  }

  private siteInputFromConfig(): SiteInput {
    return {
      hostname: this.configService.get<string>('INSTALL_HOSTNAME') ?? '',
      runDir: this.configService.get<string>('INSTALL_RUN_DIR') ?? '',
      installDir: this.configService.get<string>('INSTALL_DIR') ?? '',
    };
  }

  /**
   * Rechaza valores que alterarían la estructura del archivo generado.
   * Los vacíos se dejan pasar: el renderizado los informa como valores que faltan.
   */
  private assertSiteInput({ hostname, runDir, installDir }: SiteInput, labels: SiteInputLabels) {
    if (hostname) {
      this.assertHostname(hostname, labels.hostname);
    }

    const directories = [
      [labels.runDir, runDir],
      [labels.installDir, installDir],
    ] as const;

    for (const [label, value] of directories) {
      if (value && !DIRECTORY_PATTERN.test(value)) {
        throw new BadRequestException(`${label} debe ser una ruta absoluta sin barra final.`);
      }
    }
  }

  private renderBindings(bindings: object): string {
    let config: string;
    try {
      config = renderTemplate(NGINX_SITE_TEMPLATE, bindings);
    } catch (error) {
      if (error instanceof MissingConfigurationValueError) {
        this.logger.warn(error.message);
        throw new BadRequestException(error.message);
      }
      throw error;
    }

    const problems = checkNginxSyntax(config);
    if (problems.length > 0) {
      const message = `La configuración generada no es válida: ${problems.join('; ')}`;
      this.logger.error(message);
      throw new BadRequestException(message);
    }

    return config;
  }

  private sitePath(hostname: string): string {
    return join(this.nginxPath, `${hostname}.conf`);
  }

  private assertHostname(hostname: string, label = 'hostname') {
    // `<hostname>.conf.tmp` tiene que caber en un nombre de archivo (255 bytes)
    if (hostname.length > HOSTNAME_MAX_LENGTH) {
      throw new BadRequestException(
        `${label} demasiado largo: máximo ${HOSTNAME_MAX_LENGTH} caracteres.`,
      );
    }
    if (!HOSTNAME_PATTERN.test(hostname)) {
      throw new BadRequestException(
        `${label} inválido: ${hostname}. Solo se permiten letras minúsculas, números, guiones y puntos.`,
      );
    }
  }

  private async reloadNginx(): Promise<boolean> {
    if (!this.reloadCommand) {
      this.logger.log('Recarga de Nginx desactivada (NGINX_RELOAD_COMMAND vacío)');
      return false;
    }

    try {
      await execPromise(this.reloadCommand, { timeout: this.reloadTimeoutMs });
      this.logger.log('Nginx recargado exitosamente');
      return true;
    } catch (reloadError) {
      this.logger.warn(
        `No se pudo recargar Nginx automáticamente: ${describeError(reloadError)}. ` +
          `Necesitarás recargar Nginx manualmente.`,
      );
      return false;
    }
  }
}

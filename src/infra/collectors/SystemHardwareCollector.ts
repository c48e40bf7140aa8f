import { execFile } from 'node:child_process';
import { readFile } from 'node:fs/promises';
import os from 'node:os';
import { promisify } from 'node:util';
import { z } from 'zod';
import {
  createSnapshot,
  parseKeyValueListing,
  raw,
  structured,
  type ComponentRecord,
  type Snapshot,
} from '../../domain/entities/Snapshot.js';
import { formatFailureReason } from '../../domain/errors.js';
import { logger } from '../logger.js';
import type { CommandRunner, HardwareCollector, TextFileReader } from './HardwareCollector.js';

const execFileAsync = promisify(execFile);

const defaultRunner: CommandRunner = async (command, args, timeoutMs) => {
  const { stdout } = await execFileAsync(command, args, { timeout: timeoutMs, windowsHide: true });
  return stdout.trim();
};

const defaultReader: TextFileReader = async (path) => (await readFile(path, 'utf-8')).trim();

const CIM_QUERIES: Record<string, { className: string; properties: string }> = {
  disk: { className: 'Win32_DiskDrive', properties: 'Model,SerialNumber' },
  bios: { className: 'Win32_BIOS', properties: 'Manufacturer,SMBIOSBIOSVersion,SerialNumber' },
  motherboard: { className: 'Win32_BaseBoard', properties: 'Manufacturer,Product,SerialNumber' },
  system: { className: 'Win32_ComputerSystemProduct', properties: 'Name,Vendor,UUID' },
  cpu: { className: 'Win32_Processor', properties: 'Name,ProcessorId' },
  memory: { className: 'Win32_PhysicalMemory', properties: 'Manufacturer,PartNumber,SerialNumber,Capacity' },
  gpu: { className: 'Win32_VideoController', properties: 'Name,DriverVersion' },
};

const DMI_DIR = '/sys/class/dmi/id';

const lsblkSchema = z.object({
  blockdevices: z.array(
    z.object({
      name: z.string(),
      model: z.string().nullable().optional(),
      serial: z.string().nullable().optional(),
    })
  ),
});

/**
 * Collects hardware facts from the host platform
 * Windows uses CIM queries through PowerShell, Linux reads DMI and lsblk,
 * macOS reads the platform expert device from ioreg. CPU and memory fall back
 * to what Node reports wherever the platform queries do not cover them
 */
export class SystemHardwareCollector implements HardwareCollector {
  private platform: NodeJS.Platform;
  private run: CommandRunner;
  private read: TextFileReader;

  constructor(
    private options: {
      timeoutMs: number;
      platform?: NodeJS.Platform;
      run?: CommandRunner;
      readFile?: TextFileReader;
    }
  ) {
    this.platform = options.platform ?? process.platform;
    this.run = options.run ?? defaultRunner;
    this.read = options.readFile ?? defaultReader;
  }

  async collect(): Promise<Snapshot | null> {
    logger.info('Starting hardware collection', { platform: this.platform });

    try {
      const components = await this.collectPlatformComponents();
      if (!components.cpu) {
        components.cpu = this.collectCpus();
      }
      if (!components.memory) {
        components.memory = structured({ TotalBytes: String(os.totalmem()) });
      }
      components.mac = this.collectMacAddresses();
      components.os = structured({
        Hostname: os.hostname(),
        Release: os.release(),
        Arch: os.arch(),
      });

      const snapshot = createSnapshot({ platform: this.platform, components });
      logger.info('Hardware collection completed', {
        components: Object.keys(snapshot.components).length,
      });
      return snapshot;
    } catch (error) {
      logger.error('Hardware collection failed', { error: formatFailureReason(error) });
      return null;
    }
  }

  private async collectPlatformComponents(): Promise<Record<string, ComponentRecord>> {
    switch (this.platform) {
      case 'win32':
        return this.collectWindows();
      case 'linux':
        return this.collectLinux();
      case 'darwin':
        return this.collectDarwin();
      default:
        logger.warn('Unsupported platform for hardware queries', { platform: this.platform });
        return {};
    }
  }

  private async collectWindows(): Promise<Record<string, ComponentRecord>> {
    const components: Record<string, ComponentRecord> = {};
    for (const [name, query] of Object.entries(CIM_QUERIES)) {
      components[name] = await this.degrade(async () => {
        const text = await this.run(
          'powershell',
          [
            '-NoProfile',
            '-Command',
            `Get-CimInstance -ClassName ${query.className} | Select-Object ${query.properties} | Format-List`,
          ],
          this.options.timeoutMs
        );
        const entries = parseKeyValueListing(text);
        return entries.length > 0 ? structured(...entries) : raw(text);
      });
    }
    return components;
  }

  private async collectLinux(): Promise<Record<string, ComponentRecord>> {
    const dmi = async (field: string): Promise<string> => this.read(`${DMI_DIR}/${field}`);

    return {
      disk: await this.degrade(async () => {
        const output = await this.run(
          'lsblk',
          ['-J', '-d', '-o', 'NAME,MODEL,SERIAL'],
          this.options.timeoutMs
        );
        const { blockdevices } = lsblkSchema.parse(JSON.parse(output));
        return structured(
          ...blockdevices.map((device) => ({
            Name: device.name,
            Model: device.model?.trim() ?? '',
            SerialNumber: device.serial?.trim() ?? '',
          }))
        );
      }),
      bios: await this.degrade(async () =>
        structured({
          Vendor: await dmi('bios_vendor'),
          Version: await dmi('bios_version'),
          SerialNumber: await dmi('product_serial'),
        })
      ),
      motherboard: await this.degrade(async () =>
        structured({
          Manufacturer: await dmi('board_vendor'),
          Product: await dmi('board_name'),
          SerialNumber: await dmi('board_serial'),
        })
      ),
      system: await this.degrade(async () =>
        structured({ Name: await dmi('product_name'), UUID: await dmi('product_uuid') })
      ),
    };
  }

  private async collectDarwin(): Promise<Record<string, ComponentRecord>> {
    const output = await this.degradeText(() =>
      this.run('ioreg', ['-rd1', '-c', 'IOPlatformExpertDevice'], this.options.timeoutMs)
    );
    if (output.startsWith('Error:')) {
      return { bios: raw(output), system: raw(output) };
    }

    const property = (name: string): string => {
      const match = new RegExp(`"${name}"\\s*=\\s*"([^"]*)"`).exec(output);
      return match ? match[1] : '';
    };

    return {
      bios: structured({ SerialNumber: property('IOPlatformSerialNumber') }),
      system: structured({ Name: property('model'), UUID: property('IOPlatformUUID') }),
    };
  }

  // One entry per CPU model with its logical core count
  private collectCpus(): ComponentRecord {
    const cores = new Map<string, number>();
    for (const cpu of os.cpus()) {
      const model = cpu.model.trim();
      cores.set(model, (cores.get(model) ?? 0) + 1);
    }
    return structured(...Array.from(cores, ([Name, count]) => ({ Name, Cores: String(count) })));
  }

  private collectMacAddresses(): ComponentRecord {
    const entries: Array<Record<string, string>> = [];
    for (const [name, addresses] of Object.entries(os.networkInterfaces())) {
      const link = addresses?.find((address) => !address.internal && address.mac !== '00:00:00:00:00:00');
      if (link) {
        entries.push({ Name: name, MacAddress: link.mac });
      }
    }
    return structured(...entries);
  }

  private async degrade(query: () => Promise<ComponentRecord>): Promise<ComponentRecord> {
    try {
      return await query();
    } catch (error) {
      const reason = formatFailureReason(error);
      logger.warn('Hardware query failed, keeping raw error text', { error: reason });
      return raw(`Error: ${reason}`);
    }
  }

  private async degradeText(query: () => Promise<string>): Promise<string> {
    try {
      return await query();
    } catch (error) {
      return `Error: ${formatFailureReason(error)}`;
    }
  }
}

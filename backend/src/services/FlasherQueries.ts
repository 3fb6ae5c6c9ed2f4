import { FirmwareSummary, toFirmwareSummary } from '../models/Firmware';
import { FirmwareCatalog } from './FirmwareCatalog';
import { PortEnumerator, PortInfo } from './PortEnumerator';

/** Read side consumed by the presentation layer. */
export class FlasherQueries {
  private catalog: FirmwareCatalog;
  private ports: PortEnumerator;

  constructor(catalog: FirmwareCatalog, ports: PortEnumerator) {
    this.catalog = catalog;
    this.ports = ports;
  }

  listFirmware(): FirmwareSummary[] {
    return this.catalog.list().map(toFirmwareSummary);
  }

  getFirmware(name: string): FirmwareSummary | undefined {
    const firmware = this.catalog.get(name);
    return firmware ? toFirmwareSummary(firmware) : undefined;
  }

  listPorts(): Promise<PortInfo[]> {
    return this.ports.list();
  }

  listPortsForSelection(): Promise<PortInfo[]> {
    return this.ports.listForSelection();
  }
}

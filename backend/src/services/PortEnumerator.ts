import { SerialPort } from 'serialport';
import { errorMessage } from '../utils/errors';
import { AUTO_PORT } from '../utils/validation';

export interface PortInfo {
  device: string;
  description: string;
  hardware_id: string;
}

/** Shape of one entry reported by the serial port bindings. */
export interface SerialPortListing {
  path: string;
  manufacturer?: string;
  serialNumber?: string;
  pnpId?: string;
  vendorId?: string;
  productId?: string;
}

export type PortLister = () => Promise<SerialPortListing[]>;

export const NO_HARDWARE_ID = 'n/a';

export const AUTO_DETECT_ENTRY: PortInfo = {
  device: AUTO_PORT,
  description: 'Auto-detect',
  hardware_id: NO_HARDWARE_ID,
};

export function toPortInfo(listing: SerialPortListing): PortInfo {
  let hardwareId = NO_HARDWARE_ID;
  if (listing.vendorId && listing.productId) {
    hardwareId = `USB VID:PID=${listing.vendorId.toUpperCase()}:${listing.productId.toUpperCase()}`;
    if (listing.serialNumber) hardwareId += ` SER=${listing.serialNumber}`;
  } else if (listing.pnpId) {
    hardwareId = listing.pnpId;
  }

  return {
    device: listing.path,
    description: listing.manufacturer || 'Unknown device',
    hardware_id: hardwareId,
  };
}

export class PortEnumerator {
  private lister: PortLister;

  constructor(lister: PortLister = () => SerialPort.list()) {
    this.lister = lister;
  }

  async list(): Promise<PortInfo[]> {
    try {
      const listings = await this.lister();
      return listings.map(toPortInfo);
    } catch (err) {
      console.warn(`PortEnumerator: serial port listing failed: ${errorMessage(err)}`);
      return [];
    }
  }

  /** The list offered to the operator, with the auto-detect choice first. */
  async listForSelection(): Promise<PortInfo[]> {
    return [{ ...AUTO_DETECT_ENTRY }, ...await this.list()];
  }
}

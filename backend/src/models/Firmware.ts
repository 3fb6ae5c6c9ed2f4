import { SourceDescriptor, SourceKind, describeSource } from './SourceDescriptor';

export interface ResolvedFirmware {
  name: string;
  kind: SourceKind;
  platform: string;
  resolved_version: string | null;
  local_artifact_path: string | null;
  size_bytes: number;
  available: boolean;
  description: string;
  last_error: string | null;
}

export interface FirmwareSummary {
  name: string;
  kind: SourceKind;
  platform: string;
  version: string | null;
  size_bytes: number;
  description: string;
  available: boolean;
}

export function unresolvedFirmware(descriptor: SourceDescriptor): ResolvedFirmware {
  return {
    name: descriptor.name,
    kind: descriptor.kind,
    platform: descriptor.platform,
    resolved_version: null,
    local_artifact_path: null,
    size_bytes: 0,
    available: false,
    description: describeSource(descriptor),
    last_error: null,
  };
}

export function resolvedFirmware(
  descriptor: SourceDescriptor,
  version: string,
  artifactPath: string,
  sizeBytes: number,
): ResolvedFirmware {
  return {
    ...unresolvedFirmware(descriptor),
    resolved_version: version,
    local_artifact_path: artifactPath,
    size_bytes: sizeBytes,
    available: true,
  };
}

export function toFirmwareSummary(firmware: ResolvedFirmware): FirmwareSummary {
  return {
    name: firmware.name,
    kind: firmware.kind,
    platform: firmware.platform,
    version: firmware.resolved_version,
    size_bytes: firmware.size_bytes,
    description: firmware.description,
    available: firmware.available,
  };
}

import type { ParameterValue } from "../types/config.js";

/**
 * Supported base images and output formats.
 *
 * Profiles and formats form a closed set: a config naming anything outside
 * these tables is rejected at load time.
 */
export const PROFILES = {
  ubuntu_22: {
    iso_url: "https://cloud-images.ubuntu.com/jammy/current/jammy-server-cloudimg-amd64.img",
    iso_checksum: "file:https://cloud-images.ubuntu.com/jammy/current/SHA256SUMS",
    ssh_username: "ubuntu",
  },
  ubuntu_24: {
    iso_url: "https://cloud-images.ubuntu.com/noble/current/noble-server-cloudimg-amd64.img",
    iso_checksum: "file:https://cloud-images.ubuntu.com/noble/current/SHA256SUMS",
    ssh_username: "ubuntu",
  },
  debian_12: {
    iso_url: "https://cloud.debian.org/images/cloud/bookworm/latest/debian-12-generic-amd64.qcow2",
    iso_checksum: "file:https://cloud.debian.org/images/cloud/bookworm/latest/SHA512SUMS",
    ssh_username: "debian",
  },
} as const satisfies Record<string, Record<string, ParameterValue>>;

export type OsProfile = keyof typeof PROFILES;

export const FORMATS = {
  raw: {
    extension: "raw",
    defaults: { format: "raw" },
  },
  qcow2: {
    extension: "qcow2",
    defaults: { format: "qcow2", disk_compression: true },
  },
} as const satisfies Record<string, { extension: string; defaults: Record<string, ParameterValue> }>;

export type ImageFormat = keyof typeof FORMATS;

/** qemu builder defaults shared by every profile and format. */
export const BUILDER_DEFAULTS: Readonly<Record<string, ParameterValue>> = {
  disk_image: true,
  disk_size: "10G",
  memory: 2048,
  cpus: 2,
  accelerator: "kvm",
  headless: true,
  ssh_password: "genesis",
  ssh_timeout: "15m",
  shutdown_command: "sudo shutdown -P now",
};

export function isOsProfile(value: string): value is OsProfile {
  return Object.prototype.hasOwnProperty.call(PROFILES, value);
}

export function isImageFormat(value: string): value is ImageFormat {
  return Object.prototype.hasOwnProperty.call(FORMATS, value);
}

export function imageFileName(name: string, format: ImageFormat): string {
  return `${name}.${FORMATS[format].extension}`;
}

export const PROFILE_NAMES: OsProfile[] = Object.keys(PROFILES).filter(isOsProfile);
export const FORMAT_NAMES: ImageFormat[] = Object.keys(FORMATS).filter(isImageFormat);

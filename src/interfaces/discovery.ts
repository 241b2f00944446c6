/** A console that answered a discovery probe. */
export interface Device {
  address: string;
  name?: string;
  certificate: Uint8Array;
}

/** Probes an address or hostname and resolves with the console answering there. */
export interface DeviceLocator {
  ping(addressOrHostname: string): Promise<Device>;
}

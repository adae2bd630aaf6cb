/**
 * Network helpers for building LAN download links.
 */

import os from "os";

/**
 * First non-internal IPv4 address, so phones on the same Wi-Fi can reach the server.
 * Falls back to localhost on machines without a LAN interface.
 */
export function getLocalIp(): string {
  for (const addresses of Object.values(os.networkInterfaces())) {
    for (const address of addresses ?? []) {
      if (address.family === "IPv4" && !address.internal) {
        return address.address;
      }
    }
  }
  return "localhost";
}

export function getServerBaseUrl(port: number, publicBaseUrl?: string): string {
  if (publicBaseUrl) {
    return publicBaseUrl.replace(/\/+$/, "");
  }
  return `http://${getLocalIp()}:${port}`;
}

export function buildDownloadUrl(baseUrl: string, fileName: string): string {
  return `${baseUrl}/download/${encodeURIComponent(fileName)}`;
}

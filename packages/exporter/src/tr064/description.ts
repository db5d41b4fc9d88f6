/**
 * TR-064 device description (`tr64desc.xml`).
 *
 * Lists every service of the root device and its embedded devices. Services
 * are addressed by the last segment of their serviceId, e.g.
 * "urn:DeviceInfo-com:serviceId:DeviceInfo1" -> "DeviceInfo1".
 */

import { childList, childText, descend, parseXml } from "./xml.js";

export interface ServiceDescription {
  /** e.g. "urn:dslforum-org:service:DeviceInfo:1" */
  serviceType: string;
  serviceId: string;
  /** Path of the SOAP endpoint, e.g. "/upnp/control/deviceinfo" */
  controlURL: string;
}

export function serviceName(serviceId: string): string {
  return serviceId.slice(serviceId.lastIndexOf(":") + 1);
}

export function parseDeviceDescription(xml: string): Map<string, ServiceDescription> {
  const services = new Map<string, ServiceDescription>();

  const visit = (device: unknown): void => {
    for (const service of childList(descend(device, "serviceList"), "service")) {
      const serviceType = childText(service, "serviceType");
      const serviceId = childText(service, "serviceId");
      const controlURL = childText(service, "controlURL");
      if (!serviceType || !serviceId || !controlURL) continue;
      services.set(serviceName(serviceId), { serviceType, serviceId, controlURL });
    }
    for (const child of childList(descend(device, "deviceList"), "device")) {
      visit(child);
    }
  };

  for (const device of childList(descend(parseXml(xml), "root"), "device")) {
    visit(device);
  }
  return services;
}

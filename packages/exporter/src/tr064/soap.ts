/**
 * SOAP envelopes for TR-064 actions.
 */

import type { ActionArguments } from "@fritzbox-exporter/shared";
import { TransportError } from "../errors.js";
import { descend, isNode, parseXml } from "./xml.js";

export interface SoapFault {
  code: string;
  description: string;
}

const INTEGER_RE = /^-?\d+$/;

/** Request envelope for an action without input arguments */
export function buildEnvelope(serviceType: string, action: string): string {
  return (
    '<?xml version="1.0" encoding="utf-8"?>' +
    '<s:Envelope xmlns:s="http://schemas.xmlsoap.org/soap/envelope/" ' +
    's:encodingStyle="http://schemas.xmlsoap.org/soap/encoding/">' +
    `<s:Body><u:${action} xmlns:u="${serviceType}"></u:${action}></s:Body>` +
    "</s:Envelope>"
  );
}

/** UPnP error carried by a SOAP fault, or null if the body has none */
export function parseFault(xml: string): SoapFault | null {
  const fault = descend(parseXml(xml), "Envelope", "Body", "Fault");
  if (fault === undefined) return null;

  const upnpError = descend(fault, "detail", "UPnPError");
  const code = descend(upnpError, "errorCode");
  const description = descend(upnpError, "errorDescription");
  const faultString = descend(fault, "faultstring");
  return {
    code: typeof code === "string" ? code : "unknown",
    description:
      typeof description === "string"
        ? description
        : typeof faultString === "string"
          ? faultString
          : "SOAP fault",
  };
}

/** Output arguments of `<u:{action}Response>`; integer text becomes a number */
export function parseActionResponse(xml: string, action: string): ActionArguments {
  const body = descend(parseXml(xml), "Envelope", "Body");
  const response = descend(body, `${action}Response`);

  // An action without output arguments has an empty response element
  if (response === "") return {};
  if (!isNode(response)) {
    throw new TransportError(`Response to ${action} has no ${action}Response element`);
  }

  const args: ActionArguments = {};
  for (const [name, value] of Object.entries(response)) {
    if (typeof value !== "string") continue;
    // Integers beyond 2^53 stay text so no digits are lost
    args[name] = INTEGER_RE.test(value) && Number.isSafeInteger(Number(value)) ? Number(value) : value;
  }
  return args;
}

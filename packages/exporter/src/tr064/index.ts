/**
 * TR-064 Module
 *
 * Client for the router's TR-064 SOAP interface: device description,
 * digest auth and action calls.
 */

export { Tr064Client, DEFAULT_TR064_PORT } from "./tr064-client.js";
export type { Tr064ClientOptions } from "./tr064-client.js";
export { parseDeviceDescription, serviceName } from "./description.js";
export type { ServiceDescription } from "./description.js";
export { buildEnvelope, parseActionResponse, parseFault } from "./soap.js";
export type { SoapFault } from "./soap.js";
export { buildDigestAuthorization, parseDigestChallenge } from "./digest-auth.js";
export type { DigestChallenge, DigestCredentials, DigestRequest } from "./digest-auth.js";

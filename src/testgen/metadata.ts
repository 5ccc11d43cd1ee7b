/**
 * `-meta.xml` sidecar written beside every generated Apex class
 */

export const DEFAULT_API_VERSION = "59.0";

export const CLASS_STATUS = "Active";

export const METADATA_SUFFIX = "-meta.xml";

export function sidecarPath(classPath: string): string {
  return `${classPath}${METADATA_SUFFIX}`;
}

export function renderClassMetadata(apiVersion: string = DEFAULT_API_VERSION): string {
  return [
    `<?xml version="1.0" encoding="UTF-8"?>`,
    `<ApexClass xmlns="http://soap.sforce.com/2006/04/metadata">`,
    `    <apiVersion>${apiVersion}</apiVersion>`,
    `    <status>${CLASS_STATUS}</status>`,
    `</ApexClass>`,
    "",
  ].join("\n");
}

// Version may be injected at build time; sources fall back to the package version
declare const __VERSION__: string;

export const version = typeof __VERSION__ !== "undefined" ? __VERSION__ : "0.1.0";

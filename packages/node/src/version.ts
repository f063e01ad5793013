export const KUBENAV_VERSION = "0.1.0";

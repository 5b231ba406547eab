export const ASSETLIFT_VERSION = "0.1.0";

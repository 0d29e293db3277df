// Notefile carrying radnote dose-rate readings; every other notefile is ignored.
export const RADIATION_NOTEFILE = "_air.qo";

export const SNAPSHOT_FILE_NAME = "rad.json";

export const EARTH_RADIUS_METERS = 6_371_000;

export const DEFAULT_QUERY_RADIUS_METERS = 10;
export const DEFAULT_ALERT_SAMPLE_MINUTES = 15;
export const DEFAULT_ALERT_SYNC_MINUTES = 60;

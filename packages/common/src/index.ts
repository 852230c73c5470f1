// Sensor / row shapes (used by every vendor client and the archive)
export { VENDORS, isVendorName } from "./rows";
export type { VendorName, Sensor, TimeWindow, CellValue, Row, RowSet, ExportFormat } from "./rows";

// Request validation (used by the HTTP layer)
export { DataRequestSchema } from "./schema";
export type { DataRequest, SensorListing } from "./schema";

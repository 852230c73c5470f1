export const VENDORS = [
	"aurassure",
	"airgradient",
	"airvisual",
	"crafted-climate",
	"ecomeasure",
	"envira",
	"nebo"
] as const;

export type VendorName = (typeof VENDORS)[number];

export function isVendorName(value: string): value is VendorName {
	return (VENDORS as readonly string[]).includes(value);
}

export interface Sensor {
	id: string;
	displayName: string;
	vendor: VendorName;
}

// Half-open: [start, end)
export interface TimeWindow {
	start: Date;
	end: Date;
}

// null is the explicit "missing" marker; never a sentinel number.
export type CellValue = string | number | boolean | null;

export type Row = Record<string, CellValue>;

export interface RowSet {
	columns: string[];
	rows: Row[];
}

export type ExportFormat = "csv" | "json";

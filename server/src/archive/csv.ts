import type { RowSet } from "@air-sensor-hub/common";

import { csvToRecords, sanitizeFileName, toCsv } from "../shared/csv";

// Never number-inferred when an archive is read back.
const TEXT_COLUMNS = ["sensor_id", "sensor_name", "timestamp"];

export function archiveFileName(sensorId: string): string {
	return sanitizeFileName(`${sensorId}_history.csv`);
}

export function rowSetToCsv(rs: RowSet): string {
	return toCsv(
		rs.rows,
		rs.columns.map(c => ({ header: c, accessor: r => r[c] })),
		{ bom: false }
	);
}

export function csvToRowSet(text: string): RowSet {
	const { header, records } = csvToRecords(text, { keepText: TEXT_COLUMNS });
	return { columns: header, rows: records };
}

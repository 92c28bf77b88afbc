// tests/retire/fixtures.ts — Annotated CSV builders shared by the retirement tests

export const HEADER = [
  "#group,false,false,true,true,false,false,true,true,true",
  "#datatype,string,long,dateTime:RFC3339,dateTime:RFC3339,dateTime:RFC3339,double,string,string,string",
  "#default,_result,,,,,,,,",
  ",result,table,_start,_stop,_time,_value,_field,_measurement,RetDate",
] as const

/** Second schema: same required columns, one extra tag column. */
export const HEADER_WITH_HOST = [
  "#group,false,false,true,true,false,false,true,true,true,true",
  "#datatype,string,long,dateTime:RFC3339,dateTime:RFC3339,dateTime:RFC3339,double,string,string,string,string",
  "#default,_result,,,,,,,,,",
  ",result,table,_start,_stop,_time,_value,_field,_measurement,RetDate,host",
] as const

/** One data line under HEADER. */
export function row(measurement: string, time: string, value = "1", table = 0): string {
  return `,,${table},2019-09-01T00:00:00Z,2024-09-30T00:00:00Z,${time},${value},value,${measurement},2024-09`
}

/** One data line under HEADER_WITH_HOST. */
export function hostRow(measurement: string, time: string, host: string): string {
  return `${row(measurement, time)},${host}`
}

/** The three-point batch used across the builder and workflow tests. */
export const SAMPLE_BATCH = [
  ...HEADER,
  row("S_UpFgl_WindDirection", "2024-09-03T10:00:00Z", "181.5"),
  row("S_UpFgl_WindDirection", "2024-09-03T10:10:00Z", "179"),
  row("W_WBase_Light", "2024-09-04T06:00:00Z", "3200", 1),
]

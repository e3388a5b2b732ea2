export type IsoDateString = string;

/**
 * NYCT realtime trip ids are the tail of the static ones:
 * `AFA23GEN-J045-Weekday-00_033150_J..N15R` is published as `033150_J..N15R`.
 */
export function getRealtimeTripKey(tripId: string) {
	return tripId.split("_").slice(-2).join("_");
}

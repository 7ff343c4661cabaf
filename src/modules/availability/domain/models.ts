export interface AvailabilitySlot {
  start: string;
  end: string;
}

export interface AvailabilityResponse {
  providerId: number;
  date: string;
  timezone: string;
  durationMinutes: number;
  stepMinutes: number;
  bufferMinutes: number;
  slots: AvailabilitySlot[];
}

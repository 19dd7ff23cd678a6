/**
 * Weather Collaborator Types
 * Interfaces of the weather lookup and speech synthesis services that feed
 * the forecast cache. Implementations live outside this service.
 */

export type UnitSystem = 'imperial' | 'metric';

export interface WeatherSummary {
  city: string;
  country: string;
  temperature: number;
  feelsLike: number;
  humidity: number;
  description: string;
  windSpeed: number;
  units: UnitSystem;
}

export interface WeatherProvider {
  /** Rejects when the provider cannot answer */
  fetchCurrent(city: string): Promise<WeatherSummary>;
}

export interface SpeechSynthesizer {
  /** WAV audio for the text, read in the given tone */
  synthesize(text: string, tone: string): Promise<Buffer>;
}

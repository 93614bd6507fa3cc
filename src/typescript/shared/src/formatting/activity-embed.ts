import type { DiscordEmbed, DiscordMessage } from '../integrations/discord';
import type { StravaActivity, StravaAthlete } from '../types/strava';

// Colours per Strava activity type
const ACTIVITY_COLOURS: Record<string, number> = {
  Run: 0xfc4c02,
  Ride: 0x66c2ff,
  Hike: 0x008000,
  RockClimbing: 0xff8000,
  AlpineSki: 0xfefefe,
  BackcountrySki: 0xfefefe,
  NordicSki: 0xfefefe,
  Snowboard: 0xfefefe,
};
const DEFAULT_COLOUR = 0xfc4c02;

// Types shown with average speed instead of pace
const SPEED_TYPES = new Set(['Ride', 'VirtualRide', 'EBikeRide', 'GravelRide', 'MountainBikeRide']);

const STRAVA_ICON_URL = 'https://d3nn82uaxijpm6.cloudfront.net/apple-touch-icon-144x144.png';

const pad = (n: number) => n.toString().padStart(2, '0');

/**
 * `h:mm:ss` when the duration reaches an hour, `m:ss` below.
 */
export function formatMovingTime(totalSeconds: number): string {
  const seconds = Math.max(0, Math.round(totalSeconds));
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = seconds % 60;
  return hours > 0 ? `${hours}:${pad(minutes)}:${pad(secs)}` : `${minutes}:${pad(secs)}`;
}

export function formatDistance(metres: number): string {
  return `${(metres / 1000).toFixed(2)} km`;
}

/**
 * Minutes per kilometre, `-` for activities without distance.
 */
export function formatPace(metres: number, movingSeconds: number): string {
  if (metres <= 0) {
    return '-';
  }
  const secondsPerKm = Math.round(movingSeconds / (metres / 1000));
  return `${Math.floor(secondsPerKm / 60)}:${pad(secondsPerKm % 60)} /km`;
}

export function formatSpeed(metresPerSecond: number): string {
  return `${(metresPerSecond * 3.6).toFixed(1)} km/h`;
}

export function activityColour(type: string): number {
  return ACTIVITY_COLOURS[type] ?? DEFAULT_COLOUR;
}

export function athleteName(athlete: StravaAthlete): string {
  const name = [athlete.firstname, athlete.lastname].filter((part): part is string => !!part).join(' ');
  return name || `Athlete ${athlete.id}`;
}

export function buildActivityEmbed(activity: StravaActivity, athlete: StravaAthlete): DiscordEmbed {
  const usesSpeed = SPEED_TYPES.has(activity.type);

  return {
    title: activity.name,
    url: `https://www.strava.com/activities/${activity.id}`,
    color: activityColour(activity.type),
    timestamp: new Date(activity.start_date).toISOString(),
    author: {
      name: athleteName(athlete),
      url: `https://www.strava.com/athletes/${athlete.id}`,
      ...(athlete.profile_medium ? { icon_url: athlete.profile_medium } : {}),
    },
    footer: { text: 'Powered by Strava', icon_url: STRAVA_ICON_URL },
    fields: [
      { name: 'Distance', value: formatDistance(activity.distance), inline: true },
      { name: 'Moving Time', value: formatMovingTime(activity.moving_time), inline: true },
      usesSpeed
        ? { name: 'Average Speed', value: formatSpeed(activity.average_speed), inline: true }
        : { name: 'Pace', value: formatPace(activity.distance, activity.moving_time), inline: true },
      { name: 'Elevation', value: `${Math.round(activity.total_elevation_gain)} m`, inline: true },
    ],
  };
}

/**
 * Summary line plus embed for a newly created activity.
 */
export function buildActivityMessage(activity: StravaActivity, athlete: StravaAthlete): DiscordMessage {
  const content = `*${athleteName(athlete)} posted a new activity:* ${activity.name} (${activity.type}) ` +
    `${formatDistance(activity.distance)} in ${formatMovingTime(activity.moving_time)}`;

  return { content, embeds: [buildActivityEmbed(activity, athlete)] };
}

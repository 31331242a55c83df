/**
 * Platforms a card's QR code can point at.
 */
export enum ServiceType {
  APPLE_MUSIC = 'apple_music',
  SPOTIFY = 'spotify',
}

export const ServiceTypeDisplayNames: Record<ServiceType, string> = {
  [ServiceType.APPLE_MUSIC]: 'Apple Music',
  [ServiceType.SPOTIFY]: 'Spotify',
};

/**
 * Short names accepted in configuration next to the enum values
 */
const serviceTypeAliases: Record<string, ServiceType> = {
  apple: ServiceType.APPLE_MUSIC,
  itunes: ServiceType.APPLE_MUSIC,
};

/**
 * Check if a string is a valid ServiceType
 */
export function isValidServiceType(value: string): value is ServiceType {
  return Object.values(ServiceType).some((serviceType) => serviceType === value);
}

export function parseServiceType(value: string): ServiceType | null {
  const normalized = value.trim().toLowerCase();
  if (isValidServiceType(normalized)) {
    return normalized;
  }
  return serviceTypeAliases[normalized] ?? null;
}

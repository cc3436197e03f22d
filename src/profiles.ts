import { ValidationError } from './errors';
import type { TranscodeProfile } from './types';

const PROFILE_ENTRY = /^([A-Za-z0-9_-]+):(\d+)x(\d+):(\d+)$/;

// Formato: nome:LARGURAxALTURA:KBPS separados por vírgula, na ordem dada
export function parseProfiles(raw: string, audioBitrateKbps: number): TranscodeProfile[] {
  const entries = raw
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
  if (entries.length === 0) {
    throw new ValidationError('At least one transcode profile must be configured');
  }

  const seen = new Set<string>();
  return entries.map((entry) => {
    const match = PROFILE_ENTRY.exec(entry);
    if (!match) {
      throw new ValidationError(`Malformed transcode profile "${entry}" (expected name:WIDTHxHEIGHT:KBPS)`);
    }
    const [, name, width, height, kbps] = match;
    if (seen.has(name)) {
      throw new ValidationError(`Duplicate transcode profile "${name}"`);
    }
    seen.add(name);

    const profile: TranscodeProfile = {
      name,
      width: Number(width),
      height: Number(height),
      videoBitrateKbps: Number(kbps),
      audioBitrateKbps,
    };
    // libx264 + yuv420p exigem dimensões pares
    if (profile.width % 2 !== 0 || profile.height % 2 !== 0 || profile.videoBitrateKbps <= 0) {
      throw new ValidationError(`Invalid dimensions or bitrate in profile "${name}"`);
    }
    return profile;
  });
}

// Perfis fixos da inicialização; a ordem é a ordem de fallback
export class ProfileSet {
  private readonly byName: ReadonlyMap<string, TranscodeProfile>;

  constructor(private readonly ordered: readonly TranscodeProfile[]) {
    this.byName = new Map(ordered.map((p) => [p.name, p]));
  }

  get all(): readonly TranscodeProfile[] {
    return this.ordered;
  }

  get names(): string[] {
    return this.ordered.map((p) => p.name);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  get(name: string): TranscodeProfile {
    const profile = this.byName.get(name);
    if (!profile) {
      throw new ValidationError(`Unknown profile "${name}". Configured profiles: ${this.names.join(', ')}`);
    }
    return profile;
  }

  rank(name: string): number {
    return this.ordered.findIndex((p) => p.name === name);
  }

  sort(names: Iterable<string>): string[] {
    return [...names].filter((n) => this.has(n)).sort((a, b) => this.rank(a) - this.rank(b));
  }
}

// Não faz upscale: perfil mais alto que a fonte é pulado
export function exceedsSource(profile: TranscodeProfile, sourceHeight: number): boolean {
  return profile.height > sourceHeight;
}

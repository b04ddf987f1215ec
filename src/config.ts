import { TexFormat } from './gx/gx_enum.js';
import { MipmapInterpolation } from './gx/gx_mipmap.js';

export interface TplConfig {
    // Print debug-level messages.
    verbose: boolean;
    // Resampling used when mipmaps are generated rather than supplied.
    defaultInterpolation: MipmapInterpolation;
    // Format assumed for headerless files when the caller does not name one.
    defaultHeaderlessFormat: TexFormat;
    // Headerless files only ever carry the base level.
    headerlessMipCount: 1;
}

export function getDefaultConfig(): TplConfig {
    return {
        verbose: false,
        defaultInterpolation: MipmapInterpolation.Bicubic,
        defaultHeaderlessFormat: TexFormat.CMPR,
        headerlessMipCount: 1,
    };
}

export function resolveConfig(overrides: Partial<TplConfig> = {}): TplConfig {
    return { ...getDefaultConfig(), ...overrides };
}

export { default as ArrayBufferSlice } from './ArrayBufferSlice.js';
export { DataStream } from './DataStream.js';
export { WritableStream } from './WritableStream.js';
export { Endianness } from './endian.js';
export { Logger } from './Logger.js';
export { getDefaultConfig, resolveConfig } from './config.js';
export type { TplConfig } from './config.js';
export { ArgumentError, InvalidFormatError, InvalidHeaderError, UnsupportedFormatError } from './errors.js';

export { TexFormat } from './gx/gx_enum.js';
export { calcTextureSize, decodeTexture, encodeTexture, getBitsPerPixel, getFormatName, getTexBlockInfo, isSupportedFormat } from './gx/gx_texture.js';
export type { TexBlockInfo } from './gx/gx_texture.js';
export { MipmapInterpolation, calcMaxMipCount, calcMipLevelSize, generateMipChain, resampleImage } from './gx/gx_mipmap.js';
export type { MipChainOptions, RGBAImage } from './gx/gx_mipmap.js';

export { GxGame, getDxFormatCode, getGamePolicy, getHeaderSize, getMagicSize, isGxGame } from './AmusementVision/GxGame.js';
export type { GxGamePolicy, TplHeaderSchema } from './AmusementVision/GxGame.js';
export { AVTplTexture, calcLevelReadSize } from './AmusementVision/AVTplTexture.js';
export type { AVTplTextureContents, DxDescriptorFields, LoadTextureDataOptions, TextureFromImageOptions, TplLevel, TplLevelData } from './AmusementVision/AVTplTexture.js';
export { AVTpl } from './AmusementVision/AVTpl.js';
export type { MergeCollisionPolicy, TplLoadOptions } from './AmusementVision/AVTpl.js';
export { calcHeaderlessTextureSize, inferGeneratedHeader, parseDimensionsFromFilename } from './AmusementVision/AVTplHeaderless.js';
export type { GeneratedTextureHeader, InferHeaderOptions } from './AmusementVision/AVTplHeaderless.js';
export { AVGma } from './AmusementVision/AVGma.js';
export type { GmaLoadOptions, GmaModelEntry } from './AmusementVision/AVGma.js';

/**
 * The wire form of a style image. `bytes` is only present for in-memory images; network
 * and asset images are resolved to bytes by an {@link ImageLoader} before reaching the renderer.
 */
export type StyleImageArgs = {
    imageId: string;
    sdf: boolean;
    url?: string;
    assetName?: string;
    bytes?: Uint8Array;
};

/**
 * Resolves the bytes of images that are referenced rather than held in memory.
 * Resolves to `null` when the image cannot be read.
 */
export interface ImageLoader {
    load(image: NetworkStyleImage | AssetStyleImage): Promise<Uint8Array | null>;
}

/**
 * An image registered with the style, usable as `icon-image`, `fill-pattern`, `line-pattern`, ...
 */
export abstract class StyleImage {
    readonly id: string;
    /**
     * Whether the image should be interpreted as an SDF image
     */
    readonly sdf: boolean;

    constructor(id: string, sdf: boolean) {
        this.id = id;
        this.sdf = sdf;
    }

    abstract serialize(): StyleImageArgs;
}

export class NetworkStyleImage extends StyleImage {
    readonly url: string;

    constructor(id: string, url: string, options: {sdf?: boolean} = {}) {
        super(id, options.sdf ?? false);
        this.url = url.trim();
    }

    serialize(): StyleImageArgs {
        return {imageId: this.id, sdf: this.sdf, url: this.url};
    }
}

/**
 * An image bundled with the application, looked up by name.
 */
export class AssetStyleImage extends StyleImage {
    readonly assetName: string;

    constructor(id: string, assetName: string, options: {sdf?: boolean} = {}) {
        super(id, options.sdf ?? false);
        this.assetName = assetName.trim();
    }

    serialize(): StyleImageArgs {
        return {imageId: this.id, sdf: this.sdf, assetName: this.assetName};
    }
}

export class BytesStyleImage extends StyleImage {
    readonly bytes: Uint8Array;

    constructor(id: string, bytes: Uint8Array, options: {sdf?: boolean} = {}) {
        super(id, options.sdf ?? false);
        this.bytes = bytes;
    }

    serialize(): StyleImageArgs {
        return {imageId: this.id, sdf: this.sdf, bytes: this.bytes};
    }
}

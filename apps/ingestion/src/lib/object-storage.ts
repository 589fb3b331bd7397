import { mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import { randomBytes } from 'crypto';
import { dirname, isAbsolute, join, relative, resolve, sep } from 'path';
import { GetObjectCommand, NoSuchKey, PutObjectCommand, S3Client } from '@aws-sdk/client-s3';

// Key/value blob store with whole-object replace semantics. A reader either
// sees the previous object or the new one, never a partial write.
export interface ObjectStorage {
    get(key: string): Promise<string | null>;
    put(key: string, body: string, contentType?: string): Promise<void>;
    // Human-readable location for logs and outcomes
    locate(key: string): string;
}

export interface S3ObjectStorageOptions {
    bucket: string;
    region?: string;
    client?: S3Client;
}

export class S3ObjectStorage implements ObjectStorage {
    private readonly client: S3Client;
    private readonly bucket: string;

    constructor(options: S3ObjectStorageOptions) {
        this.bucket = options.bucket;
        this.client = options.client ?? new S3Client({ region: options.region });
    }

    async get(key: string): Promise<string | null> {
        try {
            const response = await this.client.send(
                new GetObjectCommand({ Bucket: this.bucket, Key: key })
            );
            if (!response.Body) {
                return null;
            }
            return await response.Body.transformToString('utf-8');
        } catch (error) {
            if (error instanceof NoSuchKey || (error instanceof Error && error.name === 'NoSuchKey')) {
                return null;
            }
            throw error;
        }
    }

    // PutObject only becomes visible once the full body is stored
    async put(key: string, body: string, contentType = 'application/json'): Promise<void> {
        await this.client.send(
            new PutObjectCommand({
                Bucket: this.bucket,
                Key: key,
                Body: body,
                ContentType: contentType,
            })
        );
    }

    locate(key: string): string {
        return `s3://${this.bucket}/${key}`;
    }
}

export class FileSystemObjectStorage implements ObjectStorage {
    private readonly root: string;

    constructor(root: string) {
        this.root = resolve(root);
    }

    private pathFor(key: string): string {
        const target = resolve(join(this.root, key));
        const fromRoot = relative(this.root, target);
        if (fromRoot === '' || fromRoot === '..' || fromRoot.startsWith(`..${sep}`) || isAbsolute(fromRoot)) {
            throw new Error(`Object key escapes storage root: ${key}`);
        }
        return target;
    }

    async get(key: string): Promise<string | null> {
        try {
            return await readFile(this.pathFor(key), 'utf8');
        } catch (error) {
            if (isErrnoException(error) && error.code === 'ENOENT') {
                return null;
            }
            throw error;
        }
    }

    // Temp file + rename: the target path only ever holds a complete object
    async put(key: string, body: string): Promise<void> {
        const target = this.pathFor(key);
        const temp = `${target}.${randomBytes(6).toString('hex')}.tmp`;

        await mkdir(dirname(target), { recursive: true });
        try {
            await writeFile(temp, body, 'utf8');
            await rename(temp, target);
        } catch (error) {
            await rm(temp, { force: true });
            throw error;
        }
    }

    locate(key: string): string {
        return this.pathFor(key);
    }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error;
}

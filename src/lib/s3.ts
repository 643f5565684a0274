/**
 * Stackseed - Object storage client
 *
 * The few bucket operations the initializers need, on top of the AWS SDK.
 * Works against AWS S3 and S3-compatible servers (MinIO, R2) with path-style
 * addressing.
 */

import {
  CreateBucketCommand,
  ListBucketsCommand,
  PutBucketPolicyCommand,
  S3Client
} from '@aws-sdk/client-s3'

export interface S3Location {
  endpoint: string
  accessKey: string
  secretKey: string
  region: string
}

export interface BucketClient {
  listBuckets(): Promise<string[]>
  /** Resolves 'exists' when the bucket is already there */
  createBucket(name: string): Promise<'created' | 'exists'>
  /** Allow anonymous object downloads */
  setPublicRead(name: string): Promise<void>
}

/** Error names the SDK uses when a bucket is already present */
const BUCKET_EXISTS = new Set(['BucketAlreadyOwnedByYou', 'BucketAlreadyExists'])

/**
 * Anonymous s3:GetObject on every object of the bucket
 */
export function publicReadPolicy(bucket: string): string {
  return JSON.stringify({
    Version: '2012-10-17',
    Statement: [
      {
        Effect: 'Allow',
        Principal: { AWS: ['*'] },
        Action: ['s3:GetObject'],
        Resource: [`arn:aws:s3:::${bucket}/*`]
      }
    ]
  })
}

export class S3BucketClient implements BucketClient {
  private readonly client: S3Client

  constructor(location: S3Location, client?: S3Client) {
    this.client = client ?? new S3Client({
      region: location.region,
      endpoint: location.endpoint,
      forcePathStyle: true, // Required for MinIO/custom endpoints
      credentials: {
        accessKeyId: location.accessKey,
        secretAccessKey: location.secretKey
      }
    })
  }

  async listBuckets(): Promise<string[]> {
    const response = await this.client.send(new ListBucketsCommand({}))
    return (response.Buckets ?? []).flatMap(bucket => (bucket.Name ? [bucket.Name] : []))
  }

  async createBucket(name: string): Promise<'created' | 'exists'> {
    try {
      await this.client.send(new CreateBucketCommand({ Bucket: name }))
      return 'created'
    } catch (error) {
      if (error instanceof Error && BUCKET_EXISTS.has(error.name)) {
        return 'exists'
      }
      throw error
    }
  }

  async setPublicRead(name: string): Promise<void> {
    await this.client.send(new PutBucketPolicyCommand({
      Bucket: name,
      Policy: publicReadPolicy(name)
    }))
  }
}

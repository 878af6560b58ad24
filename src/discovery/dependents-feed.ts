import { AxiosInstance, AxiosResponse } from 'axios';
import { z } from 'zod';
import { FetchError, describeError } from '../errors';
import { DependentsResponse, PackageRecord } from '../types';

export const DEFAULT_REGISTRY_URL = 'https://www.npmjs.com/browse/depended';
export const USER_AGENT = 'dependents-watch/1.0 (dependencies)';

const DependentSchema = z.object({
  name: z.string(),
  description: z.string().nullish(),
  maintainers: z.array(z.string()).nullish(),
  publisher: z
    .object({
      name: z.string(),
      avatars: z.record(z.string(), z.unknown()).nullish()
    })
    .nullish(),
  date: z.object({
    ts: z.number().int(),
    rel: z.string().nullish()
  }),
  version: z.string().nullish()
});

const DependentsPageSchema = z.object({
  title: z.string().nullish(),
  dependency: z.string(),
  packages: z.array(DependentSchema).nullish()
});

type Dependent = z.infer<typeof DependentSchema>;

function toRecord(dependent: Dependent): PackageRecord {
  return {
    name: dependent.name,
    publishedAt: dependent.date.ts,
    relativeDate: dependent.date.rel ?? undefined,
    description: dependent.description ?? undefined,
    maintainers: dependent.maintainers ?? [],
    publisher: dependent.publisher
      ? { name: dependent.publisher.name, avatars: dependent.publisher.avatars ?? {} }
      : undefined,
    version: dependent.version ?? undefined
  };
}

export class DependentsFeed {
  private readonly registryUrl: string;

  constructor(private readonly client: AxiosInstance, registryUrl: string = DEFAULT_REGISTRY_URL) {
    this.registryUrl = registryUrl.replace(/\/$/, '');
  }

  /**
   * Lists the packages depending on `target`, in the order the registry
   * returns them. The registry lists newest publishes first; nothing here
   * re-sorts or checks that.
   *
   * @throws FetchError when the listing cannot be retrieved or does not
   * describe `target`.
   */
  async fetchDependents(target: string): Promise<DependentsResponse> {
    const url = `${this.registryUrl}/${target}`;

    let response: AxiosResponse;
    try {
      response = await this.client.get(url, {
        headers: {
          accept: 'application/json',
          'x-spiferack': '1',
          'user-agent': USER_AGENT
        },
        validateStatus: () => true
      });
    } catch (error) {
      throw new FetchError('transport', target, `doing request for ${url}: ${describeError(error)}`, {
        cause: error
      });
    }

    if (response.status !== 200) {
      throw new FetchError('unexpected-status', target, `unexpected status code ${response.status} from ${url}`, {
        status: response.status
      });
    }

    const parsed = DependentsPageSchema.safeParse(response.data);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map(issue => `${issue.path.join('.') || '(body)'}: ${issue.message}`)
        .join('; ');
      throw new FetchError('decode', target, `decoding response from ${url}: ${issues}`, {
        cause: parsed.error
      });
    }

    const page = parsed.data;
    if (page.dependency !== target) {
      throw new FetchError('mismatch', target, `wanted dependents of ${target}, got ${page.dependency}`);
    }

    const packages = page.packages ?? [];
    if (packages.length === 0) {
      throw new FetchError('empty', target, `returned 0 dependents for ${target}`);
    }

    return {
      title: page.title ?? '',
      dependency: page.dependency,
      packages: packages.map(toRecord)
    };
  }
}

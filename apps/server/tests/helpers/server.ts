import { AddressInfo } from 'net';
import { createApp, AppInstance, AppOptions } from '../../src/app';

export interface TestServer extends AppInstance {
  port: number;
  url: string;
  close: () => Promise<void>;
}

export async function createTestServer(opts: AppOptions = {}): Promise<TestServer> {
  const instance = await createApp({ ...opts, skipRedis: true });

  await new Promise<void>((resolve) => {
    instance.httpServer.listen(0, resolve);
  });

  const address = instance.httpServer.address();
  if (!address || typeof address === 'string') throw new Error('Server has no port');
  const { port }: AddressInfo = address;
  const url = `http://localhost:${port}`;

  return {
    ...instance,
    port,
    url,
    close: async () => {
      await new Promise<void>((resolve, reject) => {
        instance.io.close((err) => (err ? reject(err) : resolve()));
      });
    },
  };
}

// speedtest-net 1.x ships no typings; @types/speedtest-net describes the 2.x API.
declare module 'speedtest-net' {
  import { EventEmitter } from 'events';

  namespace speedTest {
    interface Options {
      maxTime?: number;
      pingCount?: number;
      maxServers?: number;
      serverId?: string;
      serversUrl?: string;
      headers?: Record<string, string>;
      proxy?: string;
    }

    interface ServerData {
      host: string;
      lat: number;
      lon: number;
      location: string;
      country: string;
      cc: string;
      sponsor: string;
      distance: number;
      distanceMi: number;
      ping: number;
      id: string;
    }

    interface ClientData {
      ip: string;
      lat: number;
      lon: number;
      isp: string;
      isprating: number;
      rating: number;
      ispdlavg: number;
      ispulavg: number;
      country?: string;
    }

    interface Data {
      speeds: {
        download: number;
        upload: number;
        originalDownload: number;
        originalUpload: number;
      };
      client: ClientData;
      server: ServerData;
    }
  }

  function speedTest(options?: speedTest.Options): EventEmitter;

  export = speedTest;
}

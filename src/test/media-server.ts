import * as http from 'http'

export interface RecordedRequest {
  path: string
  range?: string
}

export interface FileRouteOptions {
  /** Answer range requests with 206 (default) or ignore them and send the full body. */
  honorRange?: boolean
  /** Send bytes up to this absolute offset, then wait for release(path). */
  holdAt?: number
  /** Omit Content-Length and Content-Range. */
  chunked?: boolean
}

type Handler = (req: http.IncomingMessage, res: http.ServerResponse) => void | Promise<void>

export interface MediaServer {
  url: (routePath: string) => string
  requests: RecordedRequest[]
  serveFile: (routePath: string, body: Buffer, options?: FileRouteOptions) => void
  serveText: (routePath: string, text: string) => void
  serveStatus: (routePath: string, status: number) => void
  serveRedirect: (routePath: string, location: string) => void
  serveStall: (routePath: string, firstBytes: Buffer) => void
  release: (routePath: string) => void
  close: () => Promise<void>
}

/** Deterministic test payload: byte i is i mod 251. */
export function makeBody(size: number): Buffer {
  const body = Buffer.alloc(size)
  for (let i = 0; i < size; i++) body[i] = i % 251
  return body
}

export async function startMediaServer(): Promise<MediaServer> {
  const routes = new Map<string, Handler>()
  const gates = new Map<string, { promise: Promise<void>; open: () => void }>()
  const requests: RecordedRequest[] = []

  const gateFor = (routePath: string) => {
    let gate = gates.get(routePath)
    if (!gate) {
      let open: () => void = () => undefined
      const promise = new Promise<void>(resolve => { open = resolve })
      gate = { promise, open }
      gates.set(routePath, gate)
    }
    return gate
  }

  const server = http.createServer((req, res) => {
    const routePath = (req.url ?? '/').split('?')[0]
    const range = req.headers.range
    requests.push(range ? { path: routePath, range } : { path: routePath })
    res.on('error', () => undefined)

    const handler = routes.get(routePath)
    if (!handler) {
      res.writeHead(404).end()
      return
    }
    void handler(req, res)
  })

  await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve))
  const address = server.address()
  if (address === null || typeof address === 'string') throw new Error('media server is not listening on a port')
  const { port } = address

  const serveFile = (routePath: string, body: Buffer, options: FileRouteOptions = {}) => {
    const { honorRange = true, holdAt, chunked = false } = options
    routes.set(routePath, async (req, res) => {
      let start = 0
      const match = /^bytes=(\d+)-$/.exec(req.headers.range ?? '')
      if (match && honorRange) {
        start = Number(match[1])
        if (start >= body.length) {
          res.writeHead(416, { 'Content-Range': `bytes */${body.length}` }).end()
          return
        }
        res.writeHead(206, chunked ? {} : {
          'Content-Length': String(body.length - start),
          'Content-Range': `bytes ${start}-${body.length - 1}/${body.length}`,
        })
      } else {
        res.writeHead(200, chunked ? {} : { 'Content-Length': String(body.length) })
      }

      if (holdAt !== undefined && holdAt > start && holdAt < body.length) {
        res.write(body.subarray(start, holdAt))
        await gateFor(routePath).promise
        if (!res.destroyed) res.end(body.subarray(holdAt))
        return
      }
      res.end(body.subarray(start))
    })
  }

  return {
    url: (routePath) => `http://127.0.0.1:${port}${routePath}`,
    requests,
    serveFile,
    serveText: (routePath, text) => {
      routes.set(routePath, (_req, res) => {
        res.writeHead(200, { 'Content-Type': 'text/plain' }).end(text)
      })
    },
    serveStatus: (routePath, status) => {
      routes.set(routePath, (_req, res) => {
        res.writeHead(status).end()
      })
    },
    serveRedirect: (routePath, location) => {
      routes.set(routePath, (_req, res) => {
        res.writeHead(302, { Location: location }).end()
      })
    },
    serveStall: (routePath, firstBytes) => {
      routes.set(routePath, (_req, res) => {
        res.writeHead(200, { 'Content-Length': String(firstBytes.length + 1024) })
        res.write(firstBytes)
      })
    },
    release: (routePath) => gateFor(routePath).open(),
    close: async () => {
      for (const gate of gates.values()) gate.open()
      server.closeAllConnections()
      await new Promise<void>(resolve => server.close(() => resolve()))
    },
  }
}

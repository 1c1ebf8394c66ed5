/**
 * Iterate a fetch request body chunk by chunk.
 * Stopping early cancels the body so the client stops sending.
 */
export async function* requestBody(body: ReadableStream<Uint8Array> | null): AsyncGenerator<Uint8Array> {
  if (!body) return

  const reader = body.getReader()
  let drained = false
  try {
    while (true) {
      const { done, value } = await reader.read()
      if (done) {
        drained = true
        return
      }
      yield value
    }
  } finally {
    if (!drained) {
      await reader.cancel()
    }
    reader.releaseLock()
  }
}

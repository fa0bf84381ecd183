/** `https://t.me/name/123?x=1`, `t.me/name`, `@name` and `name` all give `name`. */
export const normalizeChannel = (input: string): string => {
  let channel = input.trim()
  const marker = channel.indexOf("t.me/")
  if (marker !== -1) {
    channel = channel.slice(marker + "t.me/".length)
    channel = channel.split("/")[0].split("?")[0]
  }
  if (channel.startsWith("@")) {
    channel = channel.slice(1)
  }
  return channel
}

/** Channel name from a `t.me/{channel}/{id}` post link, if it is one. */
export const channelFromPostUrl = (url: string): string | null => {
  const match = /t\.me\/(?:s\/)?([A-Za-z0-9_]+)\/\d+/.exec(url)
  return match ? match[1] : null
}

export const telegramPostUrl = (channel: string, id: string): string => `https://t.me/${channel}/${id}`

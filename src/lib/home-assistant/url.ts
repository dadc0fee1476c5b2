import { InvalidUrlError } from "./errors";

/**
 * Optional scheme, then a hostname, IPv4 or IPv6 address (captured), then an
 * optional port and path.
 */
const HOST_PATTERN = new RegExp(
  [
    String.raw`\b(?:https?://)?((?:(?:www\.)?(?:[\da-z\.-]+)\.(?:[a-z]{2,6})|`,
    String.raw`(?:(?:25[0-5]|2[0-4][0-9]|[01]?[0-9][0-9]?)\.){3}(?:25[0-5]|2[`,
    String.raw`0-4][0-9]|[01]?[0-9][0-9]?)|(?:(?:[0-9a-fA-F]{1,4}:){7,7}[0-9a`,
    String.raw`-fA-F]{1,4}|(?:[0-9a-fA-F]{1,4}:){1,7}:|(?:[0-9a-fA-F]{1,4}:){`,
    String.raw`1,6}:[0-9a-fA-F]{1,4}|(?:[0-9a-fA-F]{1,4}:){1,5}(?::[0-9a-fA-F`,
    String.raw`]{1,4}){1,2}|(?:[0-9a-fA-F]{1,4}:){1,4}(?::[0-9a-fA-F]{1,4}){1`,
    String.raw`,3}|(?:[0-9a-fA-F]{1,4}:){1,3}(?::[0-9a-fA-F]{1,4}){1,4}|(?:[0`,
    String.raw`-9a-fA-F]{1,4}:){1,2}(?::[0-9a-fA-F]{1,4}){1,5}|[0-9a-fA-F]{1,`,
    String.raw`4}:(?:(?::[0-9a-fA-F]{1,4}){1,6})|:(?:(?::[0-9a-fA-F]{1,4}){1,`,
    String.raw`7}|:)|fe80:(?::[0-9a-fA-F]{0,4}){0,4}%[0-9a-zA-Z]{1,}|::(?:fff`,
    String.raw`f(?::0{1,4}){0,1}:){0,1}(?:(?:25[0-5]|(?:2[0-4]|1{0,1}[0-9]){0`,
    String.raw`,1}[0-9])\.){3,3}(?:25[0-5]|(?:2[0-4]|1{0,1}[0-9]){0,1}[0-9])|`,
    String.raw`(?:[0-9a-fA-F]{1,4}:){1,4}:(?:(?:25[0-5]|(?:2[0-4]|1{0,1}[0-9]`,
    String.raw`){0,1}[0-9])\.){3,3}(?:25[0-5]|(?:2[0-4]|1{0,1}[0-9]){0,1}[0-9`,
    String.raw`]))))(?::[0-9]{1,4}|[1-5][0-9]{4}|6[0-4][0-9]{3}|65[0-4][0-9]{`,
    String.raw`2}|655[0-2][0-9]|6553[0-5])?(?:/[\w\.-]*)*/?\b`
  ].join("")
);

/**
 * Extract the bare host or IP address from a URL or an IP-containing string.
 *
 * @throws InvalidUrlError when no host can be found
 */
export function checkUrl(raw: string): string {
  const host = HOST_PATTERN.exec(raw)?.[1];
  if (!host) {
    throw new InvalidUrlError(raw);
  }
  return host;
}

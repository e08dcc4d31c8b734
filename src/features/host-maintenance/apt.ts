/**
 * APT invocation settings shared by the package steps
 */

// Keep locally modified config files, take package defaults otherwise
export const APT_FLAGS = [
	"-y",
	"-o",
	"Dpkg::Options::=--force-confdef",
	"-o",
	"Dpkg::Options::=--force-confold",
] as const;

export const APT_ENV: Record<string, string> = {
	DEBIAN_FRONTEND: "noninteractive",
	NEEDRESTART_MODE: "a", // restart affected services without asking
};

export const INDEX_TIMEOUT = 10 * 60 * 1000;
export const PACKAGE_TIMEOUT = 60 * 60 * 1000;

export function aptGet(...args: string[]): string[] {
	return ["apt-get", ...APT_FLAGS, ...args];
}

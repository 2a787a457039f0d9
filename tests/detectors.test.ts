/**
 * Tests for individual distro detectors and their shared helpers
 * @module tests/detectors.test
 */

import { afterEach, describe, expect, it, vi } from "vitest";

import {
  DETECTORS,
  alpineDetector,
  androidDetector,
  busyBoxDetector,
  centosDetector,
  cruxDetector,
  debianDetector,
  detectorNames,
  fedoraDetector,
  gentooDetector,
  mageiaDetector,
  mxLinuxDetector,
  openSuseDetector,
  photonDetector,
  puppyDetector,
  rhelDetector,
  slackwareDetector,
  slesDetector,
  type DetectionContext,
} from "../src/detectors/index.js";
import { fieldMatchDetector, matchPrefixedKeyValueFile, scanLines } from "../src/detectors/helpers.js";
import { MemoryFileSource, type MemoryEntry } from "../src/fs/memory-source.js";
import { FileResolver } from "../src/fs/resolver.js";
import { parseKeyValue } from "../src/parsers/key-value.js";

/** Detection context over in-memory files and release file bodies. */
function context(files: Record<string, MemoryEntry> = {}, os = "", lsb = ""): DetectionContext {
  return {
    lsb: parseKeyValue(lsb),
    os: parseKeyValue(os),
    files: new FileResolver(new MemoryFileSource(files)),
  };
}

describe("detector roster", () => {
  it("should evaluate CentOS first and BusyBox last", () => {
    const names = detectorNames();

    expect(names[0]).toBe("centos");
    expect(names[names.length - 1]).toBe("busybox");
    expect(names).toHaveLength(30);
  });

  it("should have unique names", () => {
    expect(new Set(detectorNames()).size).toBe(DETECTORS.length);
  });

  it("should name a custom list", () => {
    expect(detectorNames([alpineDetector, busyBoxDetector])).toEqual(["alpine", "busybox"]);
  });
});

describe("Red Hat family", () => {
  it("should let CentOS defer to Oracle Linux", () => {
    const ctx = context({
      "/etc/oracle-release": "Oracle Linux Server release 8.3\n",
      "/etc/centos-release": "CentOS Linux release 8.3.2011\n",
    });

    expect(centosDetector.detect(ctx)?.id).toBe("ol");
  });

  it("should read RHEL from the release file when os-release lacks VERSION_ID", () => {
    const ctx = context({ "/etc/redhat-release": "Red Hat Enterprise Linux release 8.0 (Ootpa)\n" }, "ID=rhel\n");

    expect(rhelDetector.detect(ctx)?.version).toBe("8.0");
  });

  it("should not claim RHEL from an unversioned os-release alone", () => {
    expect(rhelDetector.detect(context({}, "ID=rhel\n"))).toBeNull();
  });

  it("should fall back to redhat-version", () => {
    const ctx = context({ "/etc/redhat-version": "Red Hat Enterprise Linux AS release 4 (Nahant Update 9)\n" });

    expect(rhelDetector.detect(ctx)?.version).toBe("4");
  });

  it("should report Fedora without VERSION_ID as unknown", () => {
    expect(fedoraDetector.detect(context({}, "ID=fedora\n"))?.version).toBe("unknown");
  });

  it("should not mistake RHEL text for CentOS", () => {
    const ctx = context({ "/etc/redhat-release": "Red Hat Enterprise Linux Server release 7.6 (Maipo)\n" });

    expect(centosDetector.detect(ctx)).toBeNull();
  });
});

describe("Debian family", () => {
  it("should reject a debian_version whose issue names another distro", () => {
    const ctx = context({ "/etc/debian_version": "bullseye/sid\n", "/etc/issue": "Ubuntu 20.04.1 LTS \\n \\l\n" });

    expect(debianDetector.detect(ctx)).toBeNull();
  });

  it("should reject a debian_version when os-release names another distro", () => {
    const ctx = context({ "/etc/debian_version": "bullseye/sid\n" }, "ID=ubuntu\n");

    expect(debianDetector.detect(ctx)).toBeNull();
  });

  it("should accept a bare debian_version", () => {
    const distro = debianDetector.detect(context({ "/etc/debian_version": "  9.13 \n" }));

    expect(distro?.id).toBe("debian");
    expect(distro?.version).toBe("9.13");
  });

  it("should let Debian defer to MX Linux", () => {
    const ctx = context({ "/etc/debian_version": "10.4\n", "/etc/mx-version": "MX-19.2_x64 patito feo\n" });

    expect(debianDetector.detect(ctx)?.id).toBe("mx");
  });

  it("should reject an mx-version that belongs to another distro", () => {
    expect(mxLinuxDetector.detect(context({ "/etc/mx-version": "antiX-19_x64-full\n" }))).toBeNull();
  });

  it("should prefer os-release VERSION_ID for Puppy Linux", () => {
    const ctx = context({}, "VERSION_ID=9.5\n", "DISTRIB_ID=Puppy\nDISTRIB_RELEASE=8.0\n");

    expect(puppyDetector.detect(ctx)?.version).toBe("9.5");
  });
});

describe("SUSE family", () => {
  it("should report a legacy openSUSE file without VERSION as unknown", () => {
    const distro = openSuseDetector.detect(context({ "/etc/SuSE-release": "openSUSE Tumbleweed\n" }));

    expect(distro?.version).toBe("unknown");
  });

  it("should fall back to sles-release", () => {
    const ctx = context({
      "/etc/sles-release": "SUSE Linux Enterprise Server 12 (x86_64)\nVERSION = 12\nPATCHLEVEL = 3\n",
    });

    expect(slesDetector.detect(ctx)?.version).toBe("12");
  });

  it("should not read an openSUSE file as SLES", () => {
    expect(slesDetector.detect(context({ "/etc/SuSE-release": "openSUSE 13.2 (x86_64)\nVERSION = 13.2\n" }))).toBeNull();
  });
});

describe("independent distributions", () => {
  it("should require os-release ID=gentoo", () => {
    expect(gentooDetector.detect(context({ "/etc/gentoo-release": "Gentoo Base System release 2.6\n" }))).toBeNull();
  });

  it("should report Gentoo without a release file as unknown", () => {
    expect(gentooDetector.detect(context({}, "ID=gentoo\n"))?.version).toBe("unknown");
  });

  it("should reject a slackware-version for another distro", () => {
    expect(slackwareDetector.detect(context({ "/etc/slackware-version": "Zenwalk 7.0\n" }))).toBeNull();
  });

  it("should read Slackware from os-release", () => {
    expect(slackwareDetector.detect(context({}, "ID=slackware\nVERSION_ID=15.0\n"))?.version).toBe("15.0");
  });

  it("should not claim Photon from an unversioned os-release", () => {
    expect(photonDetector.detect(context({}, "ID=photon\n"))).toBeNull();
  });

  it("should read Photon from photon-release", () => {
    const distro = photonDetector.detect(context({ "/etc/photon-release": "VMware Photon Linux release 1.0\n" }));

    expect([distro?.id, distro?.version]).toEqual(["photon", "1.0"]);
  });

  it("should reject a photon-release line without the release keyword", () => {
    const ctx = context({ "/etc/photon-release": "VMware Photon Linux 1.0\nPHOTON_BUILD_NUMBER=62c543d\n" });

    expect(photonDetector.detect(ctx)).toBeNull();
  });

  it("should take the Mageia version from VERSION", () => {
    expect(mageiaDetector.detect(context({}, "ID=mageia\nVERSION=8\nVERSION_ID=8.1\n"))?.version).toBe("8");
  });

  it("should prefer the GMS version for Android", () => {
    const ctx = context({ "/system/build.prop": "ro.com.google.gmsversion=10_202003\nro.build.version.release=10\n" });

    expect(androidDetector.detect(ctx)?.version).toBe("10_202003");
  });

  it("should report Android without version properties as unknown", () => {
    expect(androidDetector.detect(context({ "/system/build.prop": "ro.product.model=Pixel\n" }))?.version).toBe(
      "unknown"
    );
  });

  it("should report CRUX without a version line as unknown", () => {
    expect(cruxDetector.detect(context({ "/usr/bin/crux": "#!/bin/sh\nexit 0\n" }))?.version).toBe("unknown");
  });
});

describe("BusyBox", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  const binary = "\u007fELF\u0000BusyBox v1.33.1 (2021-06-20) multi-call binary\u0000";

  it("should detect the banner in /bin/true", () => {
    const distro = busyBoxDetector.detect(context({ "/bin/true": binary }));

    expect(distro?.id).toBe("busybox");
    expect(distro?.version).toBe("v1.33.1");
  });

  it("should step aside when release files exist", () => {
    expect(busyBoxDetector.detect(context({ "/bin/true": binary, "/etc/os-release": "ID=alpine\n" }))).toBeNull();
    expect(busyBoxDetector.detect(context({ "/bin/true": binary, "/etc/lsb-release": "DISTRIB_ID=X\n" }))).toBeNull();
  });

  it("should not match a binary without the banner", () => {
    expect(busyBoxDetector.detect(context({ "/bin/true": "\u007fELF\u0000GNU coreutils\u0000" }))).toBeNull();
  });

  it("should log and skip an unreadable binary", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});

    expect(busyBoxDetector.detect(context({ "/bin/true": new Error("EIO: i/o error") }))).toBeNull();
    expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining("unable to read file (/bin/true): EIO: i/o error"));
  });
});

describe("helpers", () => {
  it("should build a field-match detector", () => {
    const detector = fieldMatchDetector({
      name: "example",
      identity: { id: "example", name: "Example OS" },
      field: { from: "lsb", key: "DISTRIB_ID" },
      equals: "Example",
      version: { from: "literal", value: "1" },
    });

    expect(detector.detect(context({}, "", "DISTRIB_ID=Example\n"))?.name).toBe("Example OS");
    expect(detector.detect(context({}, "", "DISTRIB_ID=Other\n"))).toBeNull();
  });

  it("should carry both property maps into the result", () => {
    const ctx = context({}, "ID=alpine\nVERSION_ID=3.13.5\n", "DISTRIB_ID=Alpine\n");

    const distro = alpineDetector.detect(ctx);

    expect(distro?.osProperties).toBe(ctx.os);
    expect(distro?.lsbProperties).toBe(ctx.lsb);
  });

  it("should match a prefixed key/value file", () => {
    const ctx = context({ "/etc/novell-release": "Novell Open Enterprise Server 2.0\nVERSION = 2.0\n" });

    expect(matchPrefixedKeyValueFile(ctx, ["/etc/novell-release"], "Novell")).toBe("2.0");
    expect(matchPrefixedKeyValueFile(ctx, ["/etc/novell-release"], "SUSE")).toBeNull();
    expect(matchPrefixedKeyValueFile(ctx, ["/etc/missing"], "Novell")).toBeNull();
  });

  it("should scan lines past comments", () => {
    expect(scanLines("# version 1\n\nversion 2\n", /version (\d+)/)).toBe("2");
    expect(scanLines("nothing here\n", /version (\d+)/)).toBeNull();
  });
});

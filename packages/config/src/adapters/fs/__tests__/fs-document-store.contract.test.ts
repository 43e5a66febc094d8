import { mkdtemp, rm } from "node:fs/promises"
import * as os from "node:os"
import * as path from "node:path"
import { describeDocumentStoreContract } from "../../../ports/__tests__/document-store.contract"
import { FsDocumentStore } from "../fs-document-store"

describeDocumentStoreContract({
  name: "FsDocumentStore",
  make: async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "tally-fs-store-"))

    return {
      store: new FsDocumentStore({ dir }),
      cleanup: () => rm(dir, { recursive: true, force: true }),
    }
  },
})

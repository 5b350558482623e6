import { describeFormatAdapterContract } from "../../../ports/__tests__/format-adapter.contract"
import { IniFormat } from "../ini-format"

describeFormatAdapterContract({ name: "IniFormat", make: () => new IniFormat(), malformed: "[db\nhost = x\n" })

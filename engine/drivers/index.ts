// engine/drivers/index.ts
import { registerDriver, setDefaultDriverForPhase } from "@/engine/registry";

import { TrainingDriver } from "@/engine/drivers/Training";
import { StructureLearningDriver } from "@/engine/drivers/StructureLearning";
import { AppliedLearningDriver } from "@/engine/drivers/AppliedLearning";

registerDriver(TrainingDriver);
registerDriver(StructureLearningDriver);
registerDriver(AppliedLearningDriver);

setDefaultDriverForPhase("training", TrainingDriver.id);
setDefaultDriverForPhase("structure_learning", StructureLearningDriver.id);
setDefaultDriverForPhase("applied_learning", AppliedLearningDriver.id);

import { deepgramConfig, externalApiConfig, llmConfig, murfConfig } from '../config';
import { AssistantService } from './assistant';
import type { MedicineDataSet } from './catalog/MedicineCatalog';
import { MedicineLookupService } from './medicineLookup';
import { QueryHandler } from './queryHandler';
import { SpeechToTextService } from './speech/speechToText';
import { TextToSpeechService } from './speech/textToSpeech';

export type ServiceContainer = {
  data: MedicineDataSet;
  queryHandler: QueryHandler;
  lookupService: MedicineLookupService;
  speechToText: SpeechToTextService;
  textToSpeech: TextToSpeechService;
  assistant: AssistantService;
};

export type CreateServiceContainerOptions = {
  data: MedicineDataSet;
  queryHandler?: QueryHandler;
  lookupService?: MedicineLookupService;
  speechToText?: SpeechToTextService;
  textToSpeech?: TextToSpeechService;
  assistant?: AssistantService;
};

export function createServiceContainer(options: CreateServiceContainerOptions): ServiceContainer {
  const { data } = options;
  const timeoutMs = externalApiConfig.timeoutMs;

  return {
    data,
    queryHandler: options.queryHandler ?? new QueryHandler(data.catalog),
    lookupService: options.lookupService ?? new MedicineLookupService(data),
    speechToText:
      options.speechToText ?? new SpeechToTextService(deepgramConfig.apiKey, timeoutMs),
    textToSpeech: options.textToSpeech ?? new TextToSpeechService(murfConfig.apiKey, timeoutMs),
    assistant:
      options.assistant ??
      new AssistantService({
        openAIApiKey: llmConfig.openAIApiKey,
        groqApiKey: llmConfig.groqApiKey,
        timeoutMs,
      }),
  };
}

export interface ConfigTemplateAnswers {
  basePath: string;
  adHocHeaderAdd?: boolean;
  endAfterLastTrial?: boolean;
  sampleIntervalMs?: number;
  trackers?: string[];
}

export interface TrialkitConfig {
  session: {
    ad_hoc_header_add: boolean;
    end_after_last_trial: boolean;
    copy_session_settings: boolean;
    copy_participant_details: boolean;
  };
  output: {
    base_path: string;
    store_absolute_paths: boolean;
  };
  tracking: {
    sample_interval_ms: number;
    trackers: string[];
  };
}

export const DEFAULT_CONFIG: TrialkitConfig = {
  session: {
    ad_hoc_header_add: false,
    end_after_last_trial: false,
    copy_session_settings: true,
    copy_participant_details: true,
  },
  output: {
    base_path: 'data',
    store_absolute_paths: false,
  },
  tracking: {
    sample_interval_ms: 20,
    trackers: [],
  },
};

export function configTemplate(answers: ConfigTemplateAnswers): string {
  return JSON.stringify({
    session: {
      ad_hoc_header_add: answers.adHocHeaderAdd ?? DEFAULT_CONFIG.session.ad_hoc_header_add,
      end_after_last_trial: answers.endAfterLastTrial ?? DEFAULT_CONFIG.session.end_after_last_trial,
      copy_session_settings: true,
      copy_participant_details: true,
    },
    output: {
      base_path: answers.basePath,
      store_absolute_paths: false,
    },
    tracking: {
      sample_interval_ms: answers.sampleIntervalMs ?? DEFAULT_CONFIG.tracking.sample_interval_ms,
      trackers: answers.trackers ?? [],
    },
  }, null, 2);
}

export interface TemplateSet {
  header: string;
  srun: string;
  script: string;
  config: string;
}

const headerTemplate = `#{{ bash_path }}
#
#SBATCH --account={{ account }}
#SBATCH --partition={{ partition }}
#SBATCH --qos={{ qos }}
#
#SBATCH --job-name={{ job_name }}
#SBATCH --output={{ output }}
#SBATCH --error={{ error }}
#
#SBATCH --nodes={{ nodes }}
#SBATCH --ntasks-per-node={{ ntasks_per_node }}
#
#SBATCH --time={{ time }}
{% for directive in directives %}
#
#SBATCH {{ directive }}
{% endfor %}
`;

const srunTemplate = `{% if cpu_map %}
# L3 cache is the lowest level of shared memory, with L3SIZE cores per cache
# and NODESIZE/L3SIZE L3 caches per node. Using fewer than L3SIZE cores per L3
# cache may improve strong scaling performance for memory bound applications.
# The ntasks-per-node value must be equal to L3CORES*(NODESIZE/L3SIZE).

L3CORES={{ cpu_map.l3cores }}
L3SIZE={{ cpu_map.l3size }}
NODESIZE={{ cpu_map.nodesize }}

CPU_MAP={{ cpu_map.command }}

{% endif %}
SRUN_ARGS="{{ args }}"
SRUN_CALL="srun \${SRUN_ARGS}"
`;

const scriptTemplate = `
# exit on first error
set -e

# print commands
set -x

### === --- Unique identifier and directory

JOBCODE=\${SLURM_JOB_NAME}-\${SLURM_JOB_ID}
JOBDIR={{ job_dir }}
mkdir -p \${JOBDIR}

### === --- Python script and arguments

PYTHON_SCRIPT={{ python.script_name }}
PYTHON_SCRIPT_DIR={{ python.script_dir }}

PYTHON_SCRIPT_ARGS="{{ python.script_args }}"

### === --- Python executable

PYTHON_ARGS="{{ python.args }}"
PYTHON_EXEC="{{ python.path }}"

PYTHON_CALL="\${PYTHON_EXEC} \${PYTHON_ARGS}"

### === --- Setup the environment for singularity

export SIFDIR="{{ singularity.directory }}"
CONTAINER="{{ singularity.container }}"

SINGULARITY_ARGS="{{ singularity_args }}"
SINGULARITY_CALL="singularity run \${SINGULARITY_ARGS}"

source \${SIFDIR}/{{ singularity.setup_file }}

### === --- srun call

{{ srun_block }}
### === --- Print rank layout or not?

RUN_XTHI={{ run_xthi }}

### === --- ------------------------------------------------ --- === ###
### === --- Usually won't need to change anything below here --- === ###
### === --- ------------------------------------------------ --- === ###

### === --- Some job info for debugging

set +x
echo -e "Job started at " $(date)
echo ""

echo "What job is running?"
echo SLURM_JOB_ID          = $SLURM_JOB_ID
echo SLURM_JOB_NAME        = $SLURM_JOB_NAME
echo SLURM_JOB_ACCOUNT     = $SLURM_JOB_ACCOUNT
echo ""

echo "Where is the job running?"
echo SLURM_CLUSTER_NAME    = $SLURM_CLUSTER_NAME
echo SLURM_JOB_PARTITION   = $SLURM_JOB_PARTITION
echo SLURM_JOB_QOS         = $SLURM_JOB_QOS
echo SLURM_SUBMIT_DIR      = $SLURM_SUBMIT_DIR
echo ""

echo "What are we running on?"
echo SLURM_DISTRIBUTION    = $SLURM_DISTRIBUTION
echo SLURM_NTASKS          = $SLURM_NTASKS
echo SLURM_NTASKS_PER_NODE = $SLURM_NTASKS_PER_NODE
echo SLURM_JOB_NUM_NODES   = $SLURM_JOB_NUM_NODES
echo SLURM_JOB_NODELIST    = $SLURM_JOB_NODELIST
echo ""
set -x

### === --- Check the rank layout

if [[ \${RUN_XTHI} -gt 0 ]]; then
   export MPICH_ENV_DISPLAY=1
   set +x
   echo module load xthi
   module load xthi
   set -x
   echo -e "xthi started at " $(date)
   \${SRUN_CALL} xthi > \${JOBDIR}/xthi.log 2>&1
   echo -e "xthi finished at " $(date)
   unset MPICH_ENV_DISPLAY
fi

### === --- Copy files to nodes

echo -e "Start copying files to nodes: " $(date)
echo -e ""

TMP_SCRIPT=\${JOBDIR}/\${JOBCODE}-\${PYTHON_SCRIPT}

cp \${PYTHON_SCRIPT_DIR}/\${PYTHON_SCRIPT} \${TMP_SCRIPT}

sbcast --compress=none \${SIFDIR}/\${CONTAINER} /tmp/\${CONTAINER}

### === --- Run the script

set +x
echo -e "Script start time: " $(date)
echo -e ""

set -x
\${SRUN_CALL} \${SINGULARITY_CALL} /tmp/\${CONTAINER} \\
    \${PYTHON_CALL} \${TMP_SCRIPT} \${PYTHON_SCRIPT_ARGS}

echo -e "Script end time: " $(date)

### === --- Keep the scheduler logs with the job

OUTPUT_FILE={{ output_file }}
cp \${OUTPUT_FILE} \${JOBDIR}/
{% if separate_error_file %}

ERROR_FILE={{ error_file }}
cp \${ERROR_FILE} \${JOBDIR}/
{% endif %}
`;

const configTemplate = `# Auto-generated configuration for the SLURM script generator
{{ config_yaml }}`;

export const defaultTemplates: TemplateSet = {
  header: headerTemplate,
  srun: srunTemplate,
  script: scriptTemplate,
  config: configTemplate
};
